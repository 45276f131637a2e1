import { TicTacToeEngine } from '../engine/tictactoeEngine.js'
import type { Board, TurnPolicy } from '../engine/types.js'
import type { EventLogger } from '../logger.js'
import { formatBoard } from '../services/boardPrinter.js'
import { playMoves } from '../services/moveRunner.js'
import { parseMoves } from '../utils/moveParser.js'

export interface PlayOptions {
  boardSize: number
  numPlayers: number
  turnPolicy?: TurnPolicy
  printBoard?: boolean
  logger?: EventLogger
}

export interface PlayReport {
  statuses: number[]
  board: Board
  output: string
}

// Run a text move list through a fresh game and render the result
export function runPlay(input: string, options: PlayOptions): PlayReport {
  const moves = parseMoves(input)
  const engine = new TicTacToeEngine(options.boardSize, options.numPlayers, {
    turnPolicy: options.turnPolicy,
  })

  const statuses = playMoves(engine, moves, options.logger)
  const board = engine.getBoard()

  const lines = statuses.map(status => String(status))
  if (options.printBoard) {
    lines.push(formatBoard(board))
  }

  return {
    statuses,
    board,
    output: lines.length > 0 ? `${lines.join('\n')}\n` : '',
  }
}
