import type { Board } from '../engine/types.js'

// One line per row, cells separated by a single space
export function formatBoard(board: Board): string {
  return board.map(row => row.join(' ')).join('\n')
}
