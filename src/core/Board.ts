import { InvalidPositionError } from './errors';
import { Mark } from './types';
import type { Delta, PlayerId, Position } from './types';

/**
 * The four line families a run can follow
 */
export const LINE_DIRECTIONS: readonly Delta[] = [
    { dr: 0, dc: 1 },  // Horizontal
    { dr: 1, dc: 0 },  // Vertical
    { dr: 1, dc: 1 },  // Diagonal \
    { dr: 1, dc: -1 }  // Diagonal /
];

/**
 * Represents a rectangular grid of cells
 */
export class Board {
    private readonly rows: number;
    private readonly cols: number;
    private cells: Mark[][];

    constructor(rows: number = 3, cols: number = rows) {
        if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
            throw new Error(`Invalid board size ${rows}x${cols}`);
        }
        this.rows = rows;
        this.cols = cols;
        this.cells = this.createEmptyBoard();
    }

    /**
     * Creates an empty grid
     */
    private createEmptyBoard(): Mark[][] {
        return Array(this.rows)
            .fill(null)
            .map(() => Array<Mark>(this.cols).fill(Mark.EMPTY));
    }

    public getRows(): number {
        return this.rows;
    }

    public getCols(): number {
        return this.cols;
    }

    /**
     * Gets the mark at a specific position
     */
    public getCell(position: Position): Mark {
        this.assertValid(position);
        return this.cells[position.row][position.col];
    }

    /**
     * Places a mark at the specified position.
     * Returns false, leaving the board untouched, when the cell is occupied.
     */
    public place(position: Position, player: PlayerId): boolean {
        this.assertValid(position);
        if (this.cells[position.row][position.col] !== Mark.EMPTY) {
            return false;
        }
        this.cells[position.row][position.col] = player;
        return true;
    }

    /**
     * Forces a cell back to empty
     */
    public clear(position: Position): void {
        this.assertValid(position);
        this.cells[position.row][position.col] = Mark.EMPTY;
    }

    /**
     * Checks if a position is valid
     */
    public isValidPosition(position: Position): boolean {
        return (
            Number.isInteger(position.row) &&
            Number.isInteger(position.col) &&
            position.row >= 0 &&
            position.row < this.rows &&
            position.col >= 0 &&
            position.col < this.cols
        );
    }

    /**
     * Checks if a position is empty
     */
    public isEmpty(position: Position): boolean {
        return this.getCell(position) === Mark.EMPTY;
    }

    /**
     * Counts the cells holding a mark
     */
    public countOccupied(): number {
        let count = 0;
        for (const row of this.cells) {
            for (const cell of row) {
                if (cell !== Mark.EMPTY) {
                    count++;
                }
            }
        }
        return count;
    }

    /**
     * Gets a copy of the current grid
     */
    public getCells(): Mark[][] {
        return this.cells.map(row => [...row]);
    }

    /**
     * Creates an independent board with the same cells
     */
    public copy(): Board {
        const board = new Board(this.rows, this.cols);
        board.cells = this.getCells();
        return board;
    }

    /**
     * Length of the run of `mark` through `position` along `delta`,
     * the cell itself included
     */
    public countRun(position: Position, mark: Mark, delta: Delta): number {
        return 1
            + this.countDirection(position, mark, delta.dr, delta.dc)
            + this.countDirection(position, mark, -delta.dr, -delta.dc);
    }

    /**
     * Counts consecutive marks in one direction
     */
    private countDirection(position: Position, mark: Mark, dr: number, dc: number): number {
        let count = 0;
        let row = position.row + dr;
        let col = position.col + dc;

        while (
            row >= 0 &&
            row < this.rows &&
            col >= 0 &&
            col < this.cols &&
            this.cells[row][col] === mark
        ) {
            count++;
            row += dr;
            col += dc;
        }

        return count;
    }

    private assertValid(position: Position): void {
        if (!this.isValidPosition(position)) {
            throw new InvalidPositionError(position);
        }
    }
}
