// Engine abstraction types for an NxN board shared by N players

// Players are 1-indexed; 0 marks an empty cell
export type PlayerId = number
export type CellValue = number

export const EMPTY_CELL: CellValue = 0

export interface Location {
  readonly row: number
  readonly col: number
}

export interface Move {
  player: PlayerId
  location: Location
}

// [player, row, col] as it arrives from text input or JSON
export type MoveTriple = [number, number, number]

export type MoveOutcome = 'win' | 'invalid' | 'draw' | 'continue'

export type TurnPolicy = 'every-attempt' | 'valid-moves-only'

export const TURN_POLICIES: readonly TurnPolicy[] = ['every-attempt', 'valid-moves-only']

export type RejectionReason = 'not_your_turn' | 'off_board' | 'cell_occupied'

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: RejectionReason }

export interface EngineOptions {
  // Whether a rejected attempt still hands the turn to the next player
  turnPolicy?: TurnPolicy
}

export type Board = readonly (readonly CellValue[])[]

// Main engine interface
export interface GameEngine {
  readonly boardSize: number
  readonly numPlayers: number

  // Player expected to move next
  readonly currentTurn: PlayerId

  // Why the most recent attempt was rejected, null if it was accepted
  readonly lastRejection: RejectionReason | null

  // Check a move against the current state without touching it
  validateMove(player: PlayerId, location: Location): ValidationResult

  // Validate, apply and classify a move
  attemptMove(player: PlayerId, location: Location): MoveOutcome

  // Public integer encoding of an outcome
  toStatusCode(outcome: MoveOutcome, player: PlayerId): number

  getBoard(): Board
}
