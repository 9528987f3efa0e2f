import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import type { Game } from './Game';
import { formatPlayer, formatPosition } from './notation';
import type { Decision, Player } from './Player';
import { GameState, Mark } from './types';
import type { Move, PlayerId } from './types';

export interface MatchResult {
    state: GameState;
    winner: PlayerId | null;
    moves: number;
}

/**
 * Receives what happens during a match, e.g. to print it
 */
export interface MatchReporter {
    turnStarted(game: Game, player: PlayerId, name: string): void;
    movePlayed(game: Game, move: Move, name: string, decision: Decision): void;
    moveRejected(game: Game, move: Move, name: string): void;
    gameOver(game: Game, result: MatchResult, name: string | null): void;
}

/**
 * Runs a match between two players on a shared game, X first
 */
export class Match {
    private gameState: GameState;
    private moveHistory: Move[];

    constructor(
        private readonly game: Game,
        private readonly players: readonly [Player, Player],
        private readonly reporter: MatchReporter,
        private readonly logger: Logger = silentLogger
    ) {
        this.gameState = GameState.IN_PROGRESS;
        this.moveHistory = [];
    }

    /**
     * Gets the current game state
     */
    public getGameState(): GameState {
        return this.gameState;
    }

    /**
     * Gets the winner (if any)
     */
    public getWinner(): PlayerId | null {
        if (this.gameState === GameState.X_WIN) {
            return Mark.X;
        }
        if (this.gameState === GameState.O_WIN) {
            return Mark.O;
        }
        return null;
    }

    /**
     * Gets the moves committed by this match
     */
    public getMoveHistory(): Move[] {
        return [...this.moveHistory];
    }

    public getPlayer(id: PlayerId): Player {
        return id === Mark.X ? this.players[0] : this.players[1];
    }

    /**
     * Plays turns until a player wins or the board is full. Errors raised
     * by a player, such as exhausted input, end the match and propagate.
     */
    public async run(): Promise<MatchResult> {
        if (this.gameState !== GameState.IN_PROGRESS) {
            return this.result();
        }

        while (!this.game.isFull()) {
            const id = this.game.getCurrentPlayer();
            const player = this.getPlayer(id);
            this.reporter.turnStarted(this.game, id, player.name);

            const decision = await player.choose(this.game);
            const move: Move = { position: decision.position, player: id };
            if (!this.game.isValidPosition(move.position)) {
                throw new Error(`${player.name} chose ${formatPosition(move.position)}, outside the board`);
            }

            if (!this.game.place(move.position, id)) {
                this.logger.warn({ player: id, position: move.position }, 'Move rejected, cell occupied');
                this.reporter.moveRejected(this.game, move, player.name);
                continue;
            }

            this.moveHistory.push(move);
            this.reporter.movePlayed(this.game, move, player.name, decision);

            if (this.game.isWinningMove(move.position, id)) {
                this.gameState = id === Mark.X ? GameState.X_WIN : GameState.O_WIN;
                return this.finish(player.name);
            }
        }

        this.gameState = GameState.DRAW;
        return this.finish(null);
    }

    private finish(winnerName: string | null): MatchResult {
        const result = this.result();
        this.logger.info(
            { state: result.state, moves: result.moves },
            result.winner ? `${formatPlayer(result.winner)} won` : 'Draw'
        );
        this.reporter.gameOver(this.game, result, winnerName);
        return result;
    }

    private result(): MatchResult {
        return {
            state: this.gameState,
            winner: this.getWinner(),
            moves: this.game.getMoveCount()
        };
    }
}
