import { createInvalidBoardSizeError, createInvalidPlayerCountError } from '../errors.js'
import { drawStatusFor, outcomeToStatus } from './statusCodes.js'
import {
  EMPTY_CELL,
  type Board,
  type CellValue,
  type EngineOptions,
  type GameEngine,
  type Location,
  type MoveOutcome,
  type PlayerId,
  type RejectionReason,
  type TurnPolicy,
  type ValidationResult,
} from './types.js'

/**
 * Square NxN board shared by any number of players. A player wins by
 * filling an entire row, column or diagonal.
 */
export class TicTacToeEngine implements GameEngine {
  readonly boardSize: number
  readonly numPlayers: number
  readonly turnPolicy: TurnPolicy

  private readonly board: CellValue[][]
  private readonly maxValidMoves: number
  private validMoves = 0
  private whoseTurn: PlayerId = 1 // Player 1 always starts
  private rejection: RejectionReason | null = null

  constructor(boardSize: number, numPlayers: number, options: EngineOptions = {}) {
    if (!Number.isInteger(boardSize) || boardSize < 1) {
      throw createInvalidBoardSizeError(boardSize)
    }
    if (!Number.isInteger(numPlayers) || numPlayers < 1) {
      throw createInvalidPlayerCountError(numPlayers)
    }

    this.boardSize = boardSize
    this.numPlayers = numPlayers
    this.turnPolicy = options.turnPolicy ?? 'every-attempt'
    this.maxValidMoves = boardSize * boardSize
    this.board = Array.from({ length: boardSize }, () => Array<CellValue>(boardSize).fill(EMPTY_CELL))
  }

  get currentTurn(): PlayerId {
    return this.whoseTurn
  }

  get lastRejection(): RejectionReason | null {
    return this.rejection
  }

  get validMoveCount(): number {
    return this.validMoves
  }

  get drawStatus(): number {
    return drawStatusFor(this.numPlayers)
  }

  isBoardFull(): boolean {
    return this.validMoves === this.maxValidMoves
  }

  getBoard(): Board {
    return this.board.map(row => [...row])
  }

  validateMove(player: PlayerId, location: Location): ValidationResult {
    if (player !== this.whoseTurn) {
      return { valid: false, reason: 'not_your_turn' }
    }

    if (this.isOffBoard(location.row) || this.isOffBoard(location.col)) {
      return { valid: false, reason: 'off_board' }
    }

    if (this.board[location.row][location.col] !== EMPTY_CELL) {
      return { valid: false, reason: 'cell_occupied' }
    }

    return { valid: true }
  }

  attemptMove(player: PlayerId, location: Location): MoveOutcome {
    const validation = this.validateMove(player, location)
    this.rejection = validation.valid ? null : validation.reason

    if (this.turnPolicy === 'every-attempt' || validation.valid) {
      this.advanceTurn()
    }

    if (!validation.valid) {
      return 'invalid'
    }

    // Only reachable if a caller keeps feeding moves into a filled board
    if (this.isBoardFull()) {
      return 'draw'
    }

    this.board[location.row][location.col] = player
    this.validMoves++

    if (this.checkWin(location, player)) {
      return 'win'
    }

    return this.isBoardFull() ? 'draw' : 'continue'
  }

  toStatusCode(outcome: MoveOutcome, player: PlayerId): number {
    return outcomeToStatus(outcome, player, this.numPlayers)
  }

  private advanceTurn(): void {
    this.whoseTurn = (this.whoseTurn % this.numPlayers) + 1
  }

  private isOffBoard(index: number): boolean {
    return !Number.isInteger(index) || index < 0 || index >= this.boardSize
  }

  // Only the lines through the placed cell can have changed, so a single
  // pass over them is enough
  private checkWin(location: Location, player: PlayerId): boolean {
    const last = this.boardSize - 1
    let rowWin = true
    let colWin = true
    let diagDownWin = location.row === location.col
    let diagUpWin = location.row === last - location.col

    for (let idx = 0; idx < this.boardSize; idx++) {
      if (rowWin) {
        rowWin = this.board[location.row][idx] === player
      }
      if (colWin) {
        colWin = this.board[idx][location.col] === player
      }
      if (diagDownWin) {
        diagDownWin = this.board[idx][idx] === player
      }
      if (diagUpWin) {
        diagUpWin = this.board[idx][last - idx] === player
      }

      if (!(rowWin || colWin || diagDownWin || diagUpWin)) {
        return false
      }
    }

    return true
  }
}
