import type { Position } from './types';

/**
 * Thrown when a cell outside the board is accessed. This is a programming
 * error: callers are expected to validate coordinates first.
 */
export class InvalidPositionError extends Error {
    constructor(public readonly position: Position) {
        super(`Invalid position (${position.row}, ${position.col})`);
        this.name = 'InvalidPositionError';
    }
}

/**
 * Thrown when a saved board description cannot be read
 */
export class BoardFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BoardFormatError';
    }
}

/**
 * Thrown when the move input ends before a valid move was supplied
 */
export class InputExhaustedError extends Error {
    constructor(message: string = 'Input ended before a move was entered, giving up') {
        super(message);
        this.name = 'InputExhaustedError';
    }
}
