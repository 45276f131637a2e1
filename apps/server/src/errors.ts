export enum EngineErrorCode {
  // Construction errors
  INVALID_BOARD_SIZE = 'INVALID_BOARD_SIZE',
  INVALID_PLAYER_COUNT = 'INVALID_PLAYER_COUNT',

  // Input errors
  INVALID_MOVE_INPUT = 'INVALID_MOVE_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Internal errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class EngineError extends Error {
  public readonly code: EngineErrorCode
  public readonly statusCode: number
  public readonly metadata?: Record<string, unknown>

  constructor(
    message: string,
    code: EngineErrorCode,
    statusCode: number = 400,
    metadata?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'EngineError'
    this.code = code
    this.statusCode = statusCode
    this.metadata = metadata
    Object.setPrototypeOf(this, EngineError.prototype)
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      metadata: this.metadata,
    }
  }
}

// Factory functions for common errors
export function createInvalidBoardSizeError(boardSize: number): EngineError {
  return new EngineError(
    `Board size must be a positive integer, got ${boardSize}`,
    EngineErrorCode.INVALID_BOARD_SIZE,
    400,
    { boardSize }
  )
}

export function createInvalidPlayerCountError(numPlayers: number): EngineError {
  return new EngineError(
    `Player count must be a positive integer, got ${numPlayers}`,
    EngineErrorCode.INVALID_PLAYER_COUNT,
    400,
    { numPlayers }
  )
}

export function createMoveInputError(line: number, detail: string): EngineError {
  return new EngineError(
    `Line ${line}: ${detail}`,
    EngineErrorCode.INVALID_MOVE_INPUT,
    400,
    { line }
  )
}

export function createConfigError(key: string, value: string): EngineError {
  return new EngineError(
    `Invalid value for ${key}: ${value}`,
    EngineErrorCode.INVALID_CONFIG,
    400,
    { key, value }
  )
}

export function createInternalError(detail: string): EngineError {
  return new EngineError(detail, EngineErrorCode.INTERNAL_ERROR, 500)
}
