import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Game } from '../core/Game';
import type { MatchReporter, MatchResult } from '../core/Match';
import { formatPlayer, formatPosition, outlookHint, renderBoard } from '../core/notation';
import type { Decision } from '../core/Player';
import type { Move, PlayerId } from '../core/types';
import type { MoveInput } from '../human/HumanPlayer';

/**
 * Anything text can be written to, such as process.stdout
 */
export interface TextSink {
    write(text: string): unknown;
}

/**
 * Reads moves line by line from a stream, writing prompts to `output`
 */
export class ReadlineInput implements MoveInput {
    private readonly rl: Interface;
    private readonly lines: AsyncIterableIterator<string>;

    constructor(input: Readable, private readonly output: TextSink) {
        this.rl = createInterface({ input, terminal: false });
        this.lines = this.rl[Symbol.asyncIterator]();
    }

    public async readLine(prompt: string): Promise<string | null> {
        this.output.write(prompt);
        const next = await this.lines.next();
        return next.done ? null : next.value;
    }

    public close(): void {
        this.rl.close();
    }
}

/**
 * Prints the progress of a match as plain text
 */
export class ConsoleReporter implements MatchReporter {
    constructor(private readonly out: TextSink) {}

    public turnStarted(game: Game, player: PlayerId, name: string): void {
        this.out.write(`Moves: ${game.getMoveCount()} ; ${formatPlayer(player)}, ${name}\n`);
    }

    public movePlayed(game: Game, move: Move, name: string, decision: Decision): void {
        if (decision.score !== undefined) {
            this.out.write(`${name} plays at ${formatPosition(move.position)} (${decision.score})\n`);
            const hint = outlookHint(decision.score);
            if (hint) {
                this.out.write(`${hint}\n`);
            }
        } else {
            this.out.write(`${name} plays at ${formatPosition(move.position)}\n`);
        }
        this.out.write(renderBoard(game.getCells()));
    }

    public moveRejected(): void {
        this.out.write('Cannot play there, try again.\n');
    }

    public gameOver(_game: Game, result: MatchResult, name: string | null): void {
        if (result.winner) {
            this.out.write(`${formatPlayer(result.winner)}, ${name}, has won!\n`);
        } else {
            this.out.write('Draw. Nobody wins.\n');
        }
    }
}
