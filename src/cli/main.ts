import type { Readable } from 'node:stream';
import { DEFAULT_WIN_LENGTH, loadConfig } from '../config';
import type { GameConfig } from '../config';
import { Board } from '../core/Board';
import { Game } from '../core/Game';
import { Match } from '../core/Match';
import { parseBoard, renderBoard } from '../core/notation';
import type { Player } from '../core/Player';
import { Mark } from '../core/types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { ConsoleReporter, ReadlineInput } from './console';
import type { TextSink } from './console';
import { createPlayer, parseCommandLine, UsageError, USAGE } from './options';
import type { CliOptions } from './options';

export interface CliIO {
    stdin: Readable;
    stdout: TextSink;
    stderr: TextSink;
    env: NodeJS.ProcessEnv;
    readFile(path: string): Promise<string>;
    /** Overrides the logger built from LOG_LEVEL */
    logger?: Logger;
}

function defaultWinLength(rows: number, cols: number): number {
    return Math.min(DEFAULT_WIN_LENGTH, Math.max(rows, cols));
}

async function setupGame(options: CliOptions, config: GameConfig, io: CliIO): Promise<Game> {
    if (options.boardFile !== undefined) {
        const path = options.boardFile;
        const text = await io.readFile(path).catch((err: unknown) => {
            throw new Error(`Cannot open ${path}`, { cause: err });
        });
        const board = parseBoard(text);
        const winLength = options.winLength ?? config.winLength ?? defaultWinLength(board.getRows(), board.getCols());
        return new Game(board, winLength);
    }

    const rows = options.rows ?? config.rows;
    const cols = options.cols ?? config.cols;
    return new Game(new Board(rows, cols), options.winLength ?? config.winLength ?? defaultWinLength(rows, cols));
}

/**
 * Runs one match as described by the command line. Resolves to the
 * process exit code.
 */
export async function main(argv: string[], io: CliIO): Promise<number> {
    let logger: Logger | undefined = io.logger;
    let input: ReadlineInput | undefined;

    try {
        const options = parseCommandLine(argv);
        const config = loadConfig(io.env);
        const log = logger ?? createLogger(config.logLevel);
        logger = log;

        const game = await setupGame(options, config, io);
        const moveInput = new ReadlineInput(io.stdin, io.stdout);
        input = moveInput;
        const deps = { config, input: moveInput, logger: log };
        const players: [Player, Player] = [
            createPlayer(options.players[0], Mark.X, deps),
            createPlayer(options.players[1], Mark.O, deps)
        ];

        log.info(
            { rows: game.getRows(), cols: game.getCols(), winLength: game.getWinLength(), players: options.players },
            'Starting match'
        );
        io.stdout.write(renderBoard(game.getCells()));
        await new Match(game, players, new ConsoleReporter(io.stdout), log).run();
        return 0;
    } catch (err) {
        if (err instanceof UsageError) {
            io.stderr.write(`${err.message}\n${USAGE}\n`);
            return 1;
        }
        logger?.error({ err }, 'Match aborted');
        io.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
        return 1;
    } finally {
        input?.close();
    }
}
