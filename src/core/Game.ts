import { Board, LINE_DIRECTIONS } from './Board';
import { Mark } from './types';
import type { PlayerId, Position } from './types';

/**
 * Represents a position of an m,n,k game: the board, the number of
 * aligned marks needed to win, and how many moves have been played.
 *
 * The game works on its own copy of the board it is given, so the move
 * count always equals the number of occupied cells. Searches
 * mutate a Game in place through place/clear and must undo every move
 * they make before returning.
 */
export class Game {
    private readonly board: Board;
    private readonly winLength: number;
    private moveCount: number;

    constructor(board: Board = new Board(), winLength?: number) {
        const longestSide = Math.max(board.getRows(), board.getCols());
        const k = winLength ?? longestSide;
        if (!Number.isInteger(k) || k < 1 || k > longestSide) {
            throw new Error(
                `Invalid win length ${k} for a ${board.getRows()}x${board.getCols()} board`
            );
        }
        this.board = board.copy();
        this.winLength = k;
        this.moveCount = board.countOccupied();
    }

    public getRows(): number {
        return this.board.getRows();
    }

    public getCols(): number {
        return this.board.getCols();
    }

    public getWinLength(): number {
        return this.winLength;
    }

    public getMoveCount(): number {
        return this.moveCount;
    }

    /**
     * Gets the player whose turn it is, by move parity
     */
    public getCurrentPlayer(): PlayerId {
        return this.moveCount % 2 === 0 ? Mark.X : Mark.O;
    }

    public getCell(position: Position): Mark {
        return this.board.getCell(position);
    }

    /**
     * Gets a copy of the grid
     */
    public getCells(): Mark[][] {
        return this.board.getCells();
    }

    public isValidPosition(position: Position): boolean {
        return this.board.isValidPosition(position);
    }

    public isEmpty(position: Position): boolean {
        return this.board.isEmpty(position);
    }

    public isFull(): boolean {
        return this.moveCount === this.getRows() * this.getCols();
    }

    /**
     * Occupies a cell for a player. Fails without side effect when the
     * cell is already taken.
     */
    public place(position: Position, player: PlayerId): boolean {
        if (!this.board.place(position, player)) {
            return false;
        }
        this.moveCount++;
        return true;
    }

    /**
     * Empties a cell, undoing a previous place
     */
    public clear(position: Position): void {
        if (this.board.isEmpty(position)) {
            return;
        }
        this.board.clear(position);
        this.moveCount--;
    }

    /**
     * Yields the empty cells in row-major order. Emptiness is checked
     * lazily, so the caller may place and clear the yielded cell before
     * asking for the next one.
     */
    public *emptyCells(): Generator<Position> {
        const rows = this.getRows();
        const cols = this.getCols();
        for (let row = 0; row < rows; row++) {
            for (let col = 0; col < cols; col++) {
                const position = { row, col };
                if (this.board.isEmpty(position)) {
                    yield position;
                }
            }
        }
    }

    /**
     * Checks whether the mark just played at `position` completes a run
     * of at least winLength cells. Only the lines through that cell are
     * examined.
     */
    public isWinningMove(position: Position, player: PlayerId): boolean {
        for (const delta of LINE_DIRECTIONS) {
            if (this.board.countRun(position, player, delta) >= this.winLength) {
                return true;
            }
        }
        return false;
    }
}
