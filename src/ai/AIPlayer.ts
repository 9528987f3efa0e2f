import type { Game } from '../core/Game';
import type { Decision, Player } from '../core/Player';
import type { PlayerId } from '../core/types';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import { negamax, negamaxAlphaBeta } from './search';
import type { SearchAlgorithm } from './search';

/**
 * Player backed by a game-tree search with a fixed depth. The search runs
 * on the shared game and leaves it as it found it.
 */
abstract class SearchPlayer implements Player {
    public abstract readonly name: string;

    protected constructor(
        private readonly algorithm: SearchAlgorithm,
        public readonly id: PlayerId,
        public readonly depth: number,
        private readonly logger: Logger
    ) {
        if (!Number.isInteger(depth) || depth < 0) {
            throw new Error(`Invalid search depth ${depth}`);
        }
    }

    public async choose(game: Game): Promise<Decision> {
        const startedAt = Date.now();
        const result = this.algorithm(game, this.id, this.depth);
        this.logger.debug(
            {
                player: this.id,
                depth: this.depth,
                position: result.position,
                score: result.score,
                nodes: result.nodes,
                ms: Date.now() - startedAt
            },
            `${this.name} search complete`
        );
        return { position: result.position, score: result.score };
    }
}

/**
 * Plain negamax: explores every move down to the search depth
 */
export class NegamaxPlayer extends SearchPlayer {
    public readonly name = 'AI-negamax';

    constructor(id: PlayerId, depth: number = 3, logger: Logger = silentLogger) {
        super(negamax, id, depth, logger);
    }
}

/**
 * Negamax with alpha-beta pruning. Reaches the same scores as
 * NegamaxPlayer while skipping branches that cannot change the result.
 */
export class AlphaBetaPlayer extends SearchPlayer {
    public readonly name = 'AI-negamax-AB';

    constructor(id: PlayerId, depth: number = 5, logger: Logger = silentLogger) {
        super(negamaxAlphaBeta, id, depth, logger);
    }
}
