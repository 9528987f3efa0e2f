import { InputExhaustedError } from '../core/errors';
import type { Game } from '../core/Game';
import type { Decision, Player } from '../core/Player';
import type { Position } from '../core/types';

/**
 * Where a human's answers come from. Resolves to null once the input
 * has ended.
 */
export interface MoveInput {
    readLine(prompt: string): Promise<string | null>;
}

export const MOVE_PROMPT = 'Where? (row col) ';

/**
 * Parses "row col" (or "row,col") into a coordinate. Returns null unless
 * the text holds exactly two non-negative integers.
 */
export function parseCoordinates(text: string): Position | null {
    const match = /^\s*(\d+)\s*[,\s]\s*(\d+)\s*$/.exec(text);
    if (!match) {
        return null;
    }
    return { row: Number(match[1]), col: Number(match[2]) };
}

/**
 * Player that asks a person for each move. The row and column may come on
 * one line or on two consecutive lines. The coordinate is only checked
 * against the board size; an occupied cell is left to the match to reject.
 */
export class HumanPlayer implements Player {
    constructor(
        public readonly name: string,
        private readonly input: MoveInput
    ) {}

    public async choose(game: Game): Promise<Decision> {
        let prompt = MOVE_PROMPT;
        // row given alone on its line, waiting for the column
        let pendingRow: string | null = null;

        for (;;) {
            const line = await this.input.readLine(prompt);
            if (line === null) {
                throw new InputExhaustedError();
            }

            if (pendingRow === null && /^\s*\d+\s*$/.test(line)) {
                pendingRow = line.trim();
                prompt = '';
                continue;
            }
            const text = pendingRow === null ? line : `${pendingRow} ${line}`;
            pendingRow = null;

            const position = parseCoordinates(text);
            if (!position) {
                prompt = 'Invalid numbers, try again: ';
            } else if (position.row >= game.getRows()) {
                prompt = `Row out of range [0, ${game.getRows()}), try again: `;
            } else if (position.col >= game.getCols()) {
                prompt = `Column out of range [0, ${game.getCols()}), try again: `;
            } else {
                return { position };
            }
        }
    }
}
