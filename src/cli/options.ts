import { parseArgs } from 'node:util';
import { AlphaBetaPlayer, NegamaxPlayer } from '../ai/AIPlayer';
import { parseInteger } from '../config';
import type { GameConfig } from '../config';
import type { Player } from '../core/Player';
import type { PlayerId } from '../core/types';
import { HumanPlayer } from '../human/HumanPlayer';
import type { MoveInput } from '../human/HumanPlayer';
import type { Logger } from '../logger';

export const USAGE = [
    'Usage: mnk [options] <player> <player>',
    '  [options]',
    '    -b, --board <file>  start from a saved board',
    '    --rows <n>          rows of a new board',
    '    --cols <n>          columns of a new board',
    '    --win <k>           aligned marks needed to win',
    '  <player>',
    '    n, negamax          AI player, (n)egamax',
    '    a, negamax-ab       AI player, negamax-(a)lphabeta',
    '    h, human            (h)uman player',
    '    <name>              human player called <name>'
].join('\n');

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export interface CliOptions {
    boardFile?: string;
    rows?: number;
    cols?: number;
    winLength?: number;
    players: [string, string];
}

function parseArgv(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                board: { type: 'string', short: 'b' },
                rows: { type: 'string' },
                cols: { type: 'string' },
                win: { type: 'string' }
            },
            allowPositionals: true
        });
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}

export function parseCommandLine(argv: string[]): CliOptions {
    const { values, positionals } = parseArgv(argv);
    if (positionals.length !== 2) {
        throw new UsageError(`Expected two players, got ${positionals.length}`);
    }

    try {
        return {
            boardFile: values.board,
            rows: parseInteger('--rows', values.rows, undefined, 1),
            cols: parseInteger('--cols', values.cols, undefined, 1),
            winLength: parseInteger('--win', values.win, undefined, 1),
            players: [positionals[0], positionals[1]]
        };
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}

export interface PlayerFactoryDeps {
    config: GameConfig;
    input: MoveInput;
    logger: Logger;
}

/**
 * Builds the player named on the command line for the given side
 */
export function createPlayer(kind: string, id: PlayerId, deps: PlayerFactoryDeps): Player {
    switch (kind) {
        case 'n':
        case 'negamax':
            return new NegamaxPlayer(id, deps.config.negamaxDepth, deps.logger);
        case 'a':
        case 'negamax-ab':
            return new AlphaBetaPlayer(id, deps.config.alphaBetaDepth, deps.logger);
        case 'h':
        case 'human':
            return new HumanPlayer('Human', deps.input);
        default:
            return new HumanPlayer(kind, deps.input);
    }
}
