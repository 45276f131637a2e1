import { isTerminalStatus } from '../engine/statusCodes.js'
import type { GameEngine, Move } from '../engine/types.js'
import { createLogger, type EventLogger } from '../logger.js'

/**
 * Feeds moves into an engine in order and records one status per move.
 * Stops right after the first win or draw; invalid moves do not stop it.
 */
export class MoveRunner {
  private readonly logger: EventLogger

  constructor(logger?: EventLogger) {
    this.logger = logger ?? createLogger('move-runner')
  }

  run(engine: GameEngine, moves: readonly Move[]): number[] {
    const statuses: number[] = []

    for (const { player, location } of moves) {
      const outcome = engine.attemptMove(player, location)
      const status = engine.toStatusCode(outcome, player)
      statuses.push(status)

      this.logger.debug({
        evt: 'move.processed',
        index: statuses.length - 1,
        player,
        row: location.row,
        col: location.col,
        outcome,
        status,
        reason: engine.lastRejection ?? undefined,
      }, 'move processed')

      if (isTerminalStatus(status)) {
        this.logger.info({
          evt: 'game.finished',
          outcome,
          status,
          movesProcessed: statuses.length,
          movesSkipped: moves.length - statuses.length,
        }, 'game finished')
        break
      }
    }

    return statuses
  }
}

export function playMoves(engine: GameEngine, moves: readonly Move[], logger?: EventLogger): number[] {
  return new MoveRunner(logger).run(engine, moves)
}
