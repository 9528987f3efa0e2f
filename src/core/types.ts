/**
 * Represents a cell coordinate on the board
 */
export interface Position {
    row: number;
    col: number;
}

/**
 * Step between two neighbouring cells, used to walk a line
 */
export interface Delta {
    dr: number;
    dc: number;
}

/**
 * Represents the content of a cell
 */
export enum Mark {
    X = 'X',
    O = 'O',
    EMPTY = 'EMPTY'
}

/**
 * The two marks a player can leave on the board. X moves first.
 */
export type PlayerId = Mark.X | Mark.O;

/**
 * Represents the state of the game
 */
export enum GameState {
    IN_PROGRESS = 'IN_PROGRESS',
    X_WIN = 'X_WIN',
    O_WIN = 'O_WIN',
    DRAW = 'DRAW'
}

/**
 * Represents a move in the game
 */
export interface Move {
    position: Position;
    player: PlayerId;
}

export function opponent(player: PlayerId): PlayerId {
    return player === Mark.X ? Mark.O : Mark.X;
}
