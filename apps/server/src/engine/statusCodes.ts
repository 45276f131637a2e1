import { createInternalError } from '../errors.js'
import type { MoveOutcome, PlayerId } from './types.js'

// Status returned while the game is still undecided
export const NEXT_PLAYER = 0

// Draw is reported as one past the highest player id
export function drawStatusFor(numPlayers: number): number {
  return numPlayers + 1
}

export function outcomeToStatus(outcome: MoveOutcome, player: PlayerId, numPlayers: number): number {
  switch (outcome) {
    case 'win':
      return player
    case 'draw':
      return drawStatusFor(numPlayers)
    case 'invalid':
      // 0 - x keeps player 0 from producing -0
      return 0 - player
    case 'continue':
      return NEXT_PLAYER
    default: {
      const unreachable: never = outcome
      throw createInternalError(`Unknown move outcome: ${String(unreachable)}`)
    }
  }
}

// Win and draw end the game; invalid and continue do not
export function isTerminalStatus(status: number): boolean {
  return status > NEXT_PLAYER
}
