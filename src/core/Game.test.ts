import { describe, it, expect, beforeEach } from 'vitest';
import { Board } from './Board';
import { Game } from './Game';
import { Mark } from './types';

describe('Game', () => {
    let game: Game;

    beforeEach(() => {
        game = new Game(new Board(3, 3), 3);
    });

    describe('constructor', () => {
        it('starts with X as current player and no moves', () => {
            expect(game.getCurrentPlayer()).toBe(Mark.X);
            expect(game.getMoveCount()).toBe(0);
        });

        it('defaults the win length to the longest side', () => {
            expect(new Game(new Board(3, 5)).getWinLength()).toBe(5);
            expect(new Game().getWinLength()).toBe(3);
        });

        it('rejects a win length that does not fit on the board', () => {
            expect(() => new Game(new Board(3, 3), 4)).toThrow('Invalid win length 4 for a 3x3 board');
            expect(() => new Game(new Board(3, 3), 0)).toThrow('Invalid win length 0 for a 3x3 board');
        });

        it('derives the move count from a pre-populated board', () => {
            const board = new Board(3, 3);
            board.place({ row: 0, col: 0 }, Mark.X);
            board.place({ row: 1, col: 1 }, Mark.O);
            board.place({ row: 2, col: 2 }, Mark.X);

            const loaded = new Game(board, 3);

            expect(loaded.getMoveCount()).toBe(3);
            expect(loaded.getCurrentPlayer()).toBe(Mark.O);
        });

        it('is not affected by later changes to the board it was given', () => {
            const board = new Board(3, 3);
            board.place({ row: 0, col: 0 }, Mark.X);
            const loaded = new Game(board, 3);

            board.place({ row: 1, col: 1 }, Mark.O);
            board.clear({ row: 0, col: 0 });

            expect(loaded.getMoveCount()).toBe(1);
            expect(loaded.getCurrentPlayer()).toBe(Mark.O);
            expect(loaded.getCell({ row: 0, col: 0 })).toBe(Mark.X);
            expect(loaded.isEmpty({ row: 1, col: 1 })).toBe(true);
        });

        it('leaves the board it was given untouched', () => {
            const board = new Board(1, 2);
            const loaded = new Game(board, 2);

            loaded.place({ row: 0, col: 1 }, Mark.X);

            expect(board.isEmpty({ row: 0, col: 1 })).toBe(true);
            expect(loaded.getMoveCount()).toBe(1);
        });
    });

    describe('place', () => {
        it('occupies the cell and counts the move', () => {
            expect(game.place({ row: 1, col: 1 }, Mark.X)).toBe(true);
            expect(game.getCell({ row: 1, col: 1 })).toBe(Mark.X);
            expect(game.getMoveCount()).toBe(1);
            expect(game.getCurrentPlayer()).toBe(Mark.O);
        });

        it('fails on an occupied cell without changing anything', () => {
            game.place({ row: 1, col: 1 }, Mark.X);
            expect(game.place({ row: 1, col: 1 }, Mark.O)).toBe(false);
            expect(game.getCell({ row: 1, col: 1 })).toBe(Mark.X);
            expect(game.getMoveCount()).toBe(1);
        });
    });

    describe('clear', () => {
        it('undoes a place exactly', () => {
            game.place({ row: 0, col: 2 }, Mark.O);
            const cells = game.getCells();
            const moves = game.getMoveCount();

            game.place({ row: 2, col: 0 }, Mark.X);
            game.clear({ row: 2, col: 0 });

            expect(game.getCells()).toEqual(cells);
            expect(game.getMoveCount()).toBe(moves);
        });

        it('leaves the move count alone for an empty cell', () => {
            game.place({ row: 0, col: 0 }, Mark.X);
            game.clear({ row: 2, col: 2 });
            expect(game.getMoveCount()).toBe(1);
        });
    });

    describe('emptyCells', () => {
        it('yields empty cells in row-major order', () => {
            game.place({ row: 0, col: 1 }, Mark.X);
            game.place({ row: 1, col: 0 }, Mark.O);
            game.place({ row: 2, col: 2 }, Mark.X);

            expect([...game.emptyCells()]).toEqual([
                { row: 0, col: 0 },
                { row: 0, col: 2 },
                { row: 1, col: 1 },
                { row: 1, col: 2 },
                { row: 2, col: 0 },
                { row: 2, col: 1 }
            ]);
        });

        it('is generated fresh on each call', () => {
            expect([...game.emptyCells()]).toHaveLength(9);
            game.place({ row: 0, col: 0 }, Mark.X);
            expect([...game.emptyCells()]).toHaveLength(8);
        });

        it('tolerates placing and clearing the yielded cell while iterating', () => {
            const seen: string[] = [];
            for (const position of game.emptyCells()) {
                game.place(position, Mark.X);
                seen.push(`${position.row},${position.col}`);
                game.clear(position);
            }
            expect(seen).toHaveLength(9);
            expect(game.getMoveCount()).toBe(0);
        });

        it('yields nothing on a full board', () => {
            const marks = [Mark.X, Mark.O, Mark.X, Mark.X, Mark.O, Mark.O, Mark.O, Mark.X, Mark.X] as const;
            marks.forEach((mark, index) => game.place({ row: Math.floor(index / 3), col: index % 3 }, mark));

            expect([...game.emptyCells()]).toEqual([]);
            expect(game.isFull()).toBe(true);
        });
    });

    describe('isWinningMove', () => {
        it('detects a horizontal run of exactly k', () => {
            game.place({ row: 1, col: 0 }, Mark.X);
            game.place({ row: 1, col: 1 }, Mark.X);
            game.place({ row: 1, col: 2 }, Mark.X);
            expect(game.isWinningMove({ row: 1, col: 2 }, Mark.X)).toBe(true);
        });

        it('detects a vertical run of exactly k', () => {
            game.place({ row: 0, col: 2 }, Mark.O);
            game.place({ row: 1, col: 2 }, Mark.O);
            game.place({ row: 2, col: 2 }, Mark.O);
            expect(game.isWinningMove({ row: 1, col: 2 }, Mark.O)).toBe(true);
        });

        it('detects the down-right diagonal', () => {
            game.place({ row: 0, col: 0 }, Mark.X);
            game.place({ row: 1, col: 1 }, Mark.X);
            game.place({ row: 2, col: 2 }, Mark.X);
            expect(game.isWinningMove({ row: 0, col: 0 }, Mark.X)).toBe(true);
        });

        it('detects the down-left diagonal', () => {
            game.place({ row: 0, col: 2 }, Mark.O);
            game.place({ row: 1, col: 1 }, Mark.O);
            game.place({ row: 2, col: 0 }, Mark.O);
            expect(game.isWinningMove({ row: 2, col: 0 }, Mark.O)).toBe(true);
        });

        it('returns false for a run of k - 1', () => {
            game.place({ row: 0, col: 0 }, Mark.X);
            game.place({ row: 0, col: 1 }, Mark.X);
            game.place({ row: 1, col: 1 }, Mark.X);
            expect(game.isWinningMove({ row: 0, col: 1 }, Mark.X)).toBe(false);
            expect(game.isWinningMove({ row: 1, col: 1 }, Mark.X)).toBe(false);
        });

        it('does not count the opponent\'s marks', () => {
            game.place({ row: 2, col: 0 }, Mark.X);
            game.place({ row: 2, col: 1 }, Mark.O);
            game.place({ row: 2, col: 2 }, Mark.X);
            expect(game.isWinningMove({ row: 2, col: 2 }, Mark.X)).toBe(false);
        });

        it('accepts runs longer than k on a larger board', () => {
            const wide = new Game(new Board(4, 7), 4);
            for (let col = 1; col < 6; col++) {
                wide.place({ row: 3, col }, Mark.X);
            }
            expect(wide.isWinningMove({ row: 3, col: 3 }, Mark.X)).toBe(true);
        });

        it('does not detect a win with a gap', () => {
            const wide = new Game(new Board(4, 7), 4);
            wide.place({ row: 0, col: 0 }, Mark.O);
            wide.place({ row: 0, col: 1 }, Mark.O);
            wide.place({ row: 0, col: 3 }, Mark.O);
            wide.place({ row: 0, col: 4 }, Mark.O);
            expect(wide.isWinningMove({ row: 0, col: 3 }, Mark.O)).toBe(false);
        });

        it('wins with a single mark when k is 1', () => {
            const trivial = new Game(new Board(2, 2), 1);
            trivial.place({ row: 1, col: 0 }, Mark.O);
            expect(trivial.isWinningMove({ row: 1, col: 0 }, Mark.O)).toBe(true);
        });
    });
});
