import { Board } from './Board';
import { BoardFormatError } from './errors';
import { Mark } from './types';
import type { PlayerId, Position } from './types';

/**
 * Line that ends a saved board description
 */
export const BOARD_END_MARKER = '<<EOF';

/**
 * Scores beyond this magnitude mean a forced result was found
 */
export const DECISIVE_SCORE = 950;

const CELL_CHARS: Record<Mark, string> = {
    [Mark.X]: 'X',
    [Mark.O]: 'O',
    [Mark.EMPTY]: ' '
};

export function formatPosition(position: Position): string {
    return `{${position.row},${position.col}}`;
}

/**
 * "Player 1 (X)" or "Player 2 (O)"
 */
export function formatPlayer(player: PlayerId): string {
    return `Player ${player === Mark.X ? 1 : 2} (${player})`;
}

/**
 * Message addressed to the opponent of a search player, if its score is decisive
 */
export function outlookHint(score: number): string | null {
    if (score > DECISIVE_SCORE) {
        return "You'll lose!";
    }
    if (score < -DECISIVE_SCORE) {
        return 'You should win...';
    }
    return null;
}

function drawSeparator(cols: number): string {
    return '+' + '-+'.repeat(cols);
}

/**
 * Renders a grid as bordered text:
 *
 *   +-+-+
 *   |X| |
 *   +-+-+
 */
export function renderBoard(cells: readonly (readonly Mark[])[]): string {
    const cols = cells.length > 0 ? cells[0].length : 0;
    const lines = [drawSeparator(cols)];
    for (const row of cells) {
        lines.push('|' + row.map(cell => CELL_CHARS[cell] + '|').join(''));
        lines.push(drawSeparator(cols));
    }
    return lines.join('\n') + '\n';
}

/**
 * Reads a saved board. Rows are the lines starting with '|', with the
 * content of column c at character 2c + 1. Everything after the end
 * marker is ignored.
 */
export function parseBoard(text: string): Board {
    const rows: string[] = [];
    for (const rawLine of text.split('\n')) {
        const line = rawLine.replace(/\r$/, '');
        if (line === BOARD_END_MARKER) {
            break;
        }
        if (line.startsWith('|')) {
            rows.push(line);
        }
    }

    if (rows.length === 0) {
        throw new BoardFormatError('Board description has no rows');
    }

    const cols = Math.floor((rows[0].length - 1) / 2);
    if (cols < 1) {
        throw new BoardFormatError('Board description has no columns');
    }

    const board = new Board(rows.length, cols);
    rows.forEach((line, row) => {
        if (Math.floor((line.length - 1) / 2) !== cols) {
            throw new BoardFormatError(
                `Row ${row} has ${Math.floor((line.length - 1) / 2)} columns, expected ${cols}`
            );
        }
        for (let col = 0; col < cols; col++) {
            const char = line[col * 2 + 1];
            if (char === 'X') {
                board.place({ row, col }, Mark.X);
            } else if (char === 'O') {
                board.place({ row, col }, Mark.O);
            }
        }
    });
    return board;
}
