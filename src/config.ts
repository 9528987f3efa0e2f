/**
 * Runtime settings, read from the environment (and .env through dotenv
 * in the command line entry point)
 */
export interface GameConfig {
    rows: number;
    cols: number;
    /** Unset means: 4, or the longest side of a loaded board if shorter */
    winLength: number | undefined;
    negamaxDepth: number;
    alphaBetaDepth: number;
    logLevel: string;
}

export const DEFAULT_WIN_LENGTH = 4;

export const DEFAULT_CONFIG: GameConfig = {
    rows: 8,
    cols: 8,
    winLength: undefined,
    negamaxDepth: 3,
    alphaBetaDepth: 5,
    logLevel: 'warn'
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Parses an integer setting, falling back to `fallback` when unset
 */
export function parseInteger(name: string, value: string | undefined, fallback: number, min: number): number;
export function parseInteger(
    name: string,
    value: string | undefined,
    fallback: number | undefined,
    min: number
): number | undefined;
export function parseInteger(
    name: string,
    value: string | undefined,
    fallback: number | undefined,
    min: number
): number | undefined {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const trimmed = value.trim();
    const parsed = parseInt(trimmed, 10);
    if (!/^-?\d+$/.test(trimmed) || parsed < min) {
        throw new Error(`Invalid ${name}: "${value}" (expected an integer >= ${min})`);
    }
    return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
    const logLevel = env.LOG_LEVEL?.trim() || DEFAULT_CONFIG.logLevel;
    if (!LOG_LEVELS.includes(logLevel)) {
        throw new Error(`Invalid LOG_LEVEL: "${logLevel}" (expected one of ${LOG_LEVELS.join(', ')})`);
    }

    return {
        rows: parseInteger('BOARD_ROWS', env.BOARD_ROWS, DEFAULT_CONFIG.rows, 1),
        cols: parseInteger('BOARD_COLS', env.BOARD_COLS, DEFAULT_CONFIG.cols, 1),
        winLength: parseInteger('WIN_LENGTH', env.WIN_LENGTH, DEFAULT_CONFIG.winLength, 1),
        negamaxDepth: parseInteger('NEGAMAX_DEPTH', env.NEGAMAX_DEPTH, DEFAULT_CONFIG.negamaxDepth, 0),
        alphaBetaDepth: parseInteger('ALPHABETA_DEPTH', env.ALPHABETA_DEPTH, DEFAULT_CONFIG.alphaBetaDepth, 0),
        logLevel
    };
}
