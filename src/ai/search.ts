import type { Game } from '../core/Game';
import { opponent } from '../core/types';
import type { PlayerId, Position } from '../core/types';

/**
 * Magnitude of a won position. A win found with `depth` plies still to
 * search scores -WIN_SCORE + depth for the side that lost, so quicker
 * wins weigh more.
 */
export const WIN_SCORE = 1000;

export interface SearchResult {
    /** Best move, the first in row-major order among equal scores */
    position: Position;
    /** Value of that move for the searching player */
    score: number;
    /** Nodes evaluated, the root's children included */
    nodes: number;
}

export type SearchAlgorithm = (game: Game, player: PlayerId, depth: number) => SearchResult;

/**
 * Negation that never produces -0, so a drawn line reads as plain 0
 */
function negate(score: number): number {
    return score === 0 ? 0 : -score;
}

interface SearchStats {
    nodes: number;
}

/**
 * Plays `position` for `player`, evaluates the resulting node and takes
 * the move back, even if the evaluation throws.
 */
function tryMove(game: Game, position: Position, player: PlayerId, evaluate: () => number): number {
    game.place(position, player);
    try {
        return evaluate();
    } finally {
        game.clear(position);
    }
}

/**
 * Value of the node reached after `who` played `last`, for the side to
 * move there.
 */
function negamaxNode(game: Game, depth: number, who: PlayerId, last: Position, stats: SearchStats): number {
    stats.nodes++;

    if (game.isWinningMove(last, who)) {
        return -WIN_SCORE + depth;
    }
    if (depth === 0) {
        return 0;
    }

    const next = opponent(who);
    let max = -Infinity;
    for (const child of game.emptyCells()) {
        const score = negate(tryMove(game, child, next, () => negamaxNode(game, depth - 1, next, child, stats)));
        if (score > max) {
            max = score;
        }
    }

    // board full
    return max === -Infinity ? 0 : max;
}

function alphaBetaNode(
    game: Game,
    depth: number,
    who: PlayerId,
    last: Position,
    alpha: number,
    beta: number,
    stats: SearchStats
): number {
    stats.nodes++;

    if (game.isWinningMove(last, who)) {
        return -WIN_SCORE + depth;
    }
    if (depth === 0) {
        return 0;
    }

    const next = opponent(who);
    let max = -Infinity;
    for (const child of game.emptyCells()) {
        const score = negate(tryMove(game, child, next, () =>
            alphaBetaNode(game, depth - 1, next, child, -beta, -alpha, stats)
        ));
        if (score > max) {
            max = score;
        }
        if (score > alpha) {
            alpha = score;
            if (alpha >= beta) {
                break;
            }
        }
    }

    return max === -Infinity ? 0 : max;
}

/**
 * Chooses a move for `player` with plain negamax. Every candidate move is
 * followed by `depth` more plies of look-ahead.
 */
export function negamax(game: Game, player: PlayerId, depth: number): SearchResult {
    const stats: SearchStats = { nodes: 0 };
    let best: Position | null = null;
    let max = -Infinity;

    for (const position of game.emptyCells()) {
        const score = negate(tryMove(game, position, player, () => negamaxNode(game, depth, player, position, stats)));
        if (score > max) {
            max = score;
            best = position;
        }
    }

    if (best === null) {
        throw new Error('No available moves');
    }
    return { position: best, score: max, nodes: stats.nodes };
}

/**
 * Chooses a move for `player` with negamax and alpha-beta pruning. The
 * score always equals the one negamax() finds; among equally scored
 * moves the choice may differ since pruned moves are never compared.
 */
export function negamaxAlphaBeta(game: Game, player: PlayerId, depth: number): SearchResult {
    const stats: SearchStats = { nodes: 0 };
    let best: Position | null = null;
    let max = -Infinity;
    let alpha = -WIN_SCORE;
    const beta = WIN_SCORE;

    for (const position of game.emptyCells()) {
        const score = negate(tryMove(game, position, player, () =>
            alphaBetaNode(game, depth, player, position, -beta, -alpha, stats)
        ));
        if (score > max) {
            max = score;
            best = position;
        }
        if (score > alpha) {
            alpha = score;
            if (alpha >= beta) {
                break;
            }
        }
    }

    if (best === null) {
        throw new Error('No available moves');
    }
    return { position: best, score: max, nodes: stats.nodes };
}
