import { createMoveInputError } from '../errors.js'
import type { Move, MoveTriple } from '../engine/types.js'

const INTEGER_TOKEN = /^-?\d+$/

export function parseMoveTriple([player, row, col]: MoveTriple): Move {
  return { player, location: { row, col } }
}

/**
 * Parse `player row col` triples, one per line. Blank lines and lines
 * starting with `#` are skipped.
 */
export function parseMoves(text: string): Move[] {
  const moves: Move[] = []
  const lines = text.split(/\r?\n/)

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim()
    if (line === '' || line.startsWith('#')) {
      return
    }

    const tokens = line.split(/\s+/)
    if (tokens.length !== 3) {
      throw createMoveInputError(index + 1, `expected 3 integers, got ${tokens.length} tokens`)
    }

    const badToken = tokens.find(token => !INTEGER_TOKEN.test(token))
    if (badToken !== undefined) {
      throw createMoveInputError(index + 1, `not an integer: ${badToken}`)
    }

    const [player, row, col] = tokens.map(token => parseInt(token, 10))
    moves.push(parseMoveTriple([player, row, col]))
  })

  return moves
}
