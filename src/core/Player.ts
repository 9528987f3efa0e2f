import type { Game } from './Game';
import type { Position } from './types';

/**
 * What a player decided to play. Search players also report the
 * evaluation of the chosen move, from their own point of view.
 */
export interface Decision {
    position: Position;
    score?: number;
}

/**
 * A source of moves for one side of a match: a human at the console
 * or one of the search players.
 */
export interface Player {
    readonly name: string;

    /**
     * Chooses the next move. Called only while the game has an empty
     * cell; the game must be left as it was found.
     * @param game - The current position, shared with the match
     */
    choose(game: Game): Promise<Decision>;
}
