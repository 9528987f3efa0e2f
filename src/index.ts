export { Board, LINE_DIRECTIONS } from './core/Board';
export { Game } from './core/Game';
export { Match } from './core/Match';
export type { MatchReporter, MatchResult } from './core/Match';
export type { Decision, Player } from './core/Player';
export { GameState, Mark, opponent } from './core/types';
export type { Delta, Move, PlayerId, Position } from './core/types';
export { BoardFormatError, InputExhaustedError, InvalidPositionError } from './core/errors';
export {
    BOARD_END_MARKER,
    formatPlayer,
    formatPosition,
    outlookHint,
    parseBoard,
    renderBoard
} from './core/notation';
export { negamax, negamaxAlphaBeta, WIN_SCORE } from './ai/search';
export type { SearchAlgorithm, SearchResult } from './ai/search';
export { AlphaBetaPlayer, NegamaxPlayer } from './ai/AIPlayer';
export { HumanPlayer, parseCoordinates } from './human/HumanPlayer';
export type { MoveInput } from './human/HumanPlayer';
export { DEFAULT_CONFIG, loadConfig } from './config';
export type { GameConfig } from './config';
export { createLogger, silentLogger } from './logger';
