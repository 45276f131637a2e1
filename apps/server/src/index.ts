export { TicTacToeEngine } from './engine/tictactoeEngine.js'
export { NEXT_PLAYER, drawStatusFor, isTerminalStatus, outcomeToStatus } from './engine/statusCodes.js'
export { EMPTY_CELL, TURN_POLICIES } from './engine/types.js'
export type {
  Board,
  CellValue,
  EngineOptions,
  GameEngine,
  Location,
  Move,
  MoveOutcome,
  MoveTriple,
  PlayerId,
  RejectionReason,
  TurnPolicy,
  ValidationResult,
} from './engine/types.js'
export { EngineError, EngineErrorCode } from './errors.js'
export { MoveRunner, playMoves } from './services/moveRunner.js'
export { formatBoard } from './services/boardPrinter.js'
export { parseMoves, parseMoveTriple } from './utils/moveParser.js'
