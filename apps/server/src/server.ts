import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import cors from '@fastify/cors'
import { MAX_BOARD_SIZE, MAX_PLAYERS, type AppConfig } from './config.js'
import { TicTacToeEngine } from './engine/tictactoeEngine.js'
import type { Board, MoveTriple, TurnPolicy } from './engine/types.js'
import { formatBoard } from './services/boardPrinter.js'
import { playMoves } from './services/moveRunner.js'
import { parseMoveTriple } from './utils/moveParser.js'

export interface PlayRequestBody {
  boardSize: number
  numPlayers: number
  moves: MoveTriple[]
  turnPolicy?: TurnPolicy
}

export interface PlayResponseBody {
  statuses: number[]
  finished: boolean
  winner: number | 'draw' | null
  board: Board
  rendered: string
}

const playRequestSchema = {
  type: 'object',
  required: ['boardSize', 'numPlayers', 'moves'],
  additionalProperties: false,
  properties: {
    boardSize: { type: 'integer', minimum: 1, maximum: MAX_BOARD_SIZE },
    numPlayers: { type: 'integer', minimum: 1, maximum: MAX_PLAYERS },
    turnPolicy: { type: 'string', enum: ['every-attempt', 'valid-moves-only'] },
    moves: {
      type: 'array',
      items: {
        type: 'array',
        minItems: 3,
        maxItems: 3,
        items: { type: 'integer' },
      },
    },
  },
} as const

export function describeResult(statuses: number[], drawStatus: number): Pick<PlayResponseBody, 'finished' | 'winner'> {
  const last = statuses.length > 0 ? statuses[statuses.length - 1] : 0
  if (last <= 0) {
    return { finished: false, winner: null }
  }
  return { finished: true, winner: last === drawStatus ? 'draw' : last }
}

export async function buildServer(options: Pick<FastifyServerOptions, 'logger'> = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
    // Moves must arrive as integers; unknown fields are rejected, not stripped
    ajv: { customOptions: { coerceTypes: false, removeAdditional: false } },
  })

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  })

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_FAILED', message: error.message })
    }

    request.log.error(error)
    return reply.code(500).send({ error: 'INTERNAL_ERROR', message: 'Internal server error' })
  })

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    }
  })

  // Stateless: every request replays its moves into a fresh engine
  fastify.post<{ Body: PlayRequestBody }>('/games/play', { schema: { body: playRequestSchema } }, async (request) => {
    const { boardSize, numPlayers, moves, turnPolicy } = request.body
    const engine = new TicTacToeEngine(boardSize, numPlayers, { turnPolicy })

    const statuses = playMoves(engine, moves.map(parseMoveTriple), request.log)
    const board = engine.getBoard()

    const response: PlayResponseBody = {
      statuses,
      ...describeResult(statuses, engine.drawStatus),
      board,
      rendered: formatBoard(board),
    }
    return response
  })

  return fastify
}

export async function startServer(config: Pick<AppConfig, 'port' | 'host' | 'logLevel'>): Promise<FastifyInstance> {
  const fastify = await buildServer({ logger: { level: config.logLevel } })

  // Graceful shutdown handling
  const shutdown = async (signal: string) => {
    fastify.log.info({ evt: 'server.shutdown', signal }, `${signal} received, starting graceful shutdown...`)
    await fastify.close()
    fastify.log.info({ evt: 'server.closed' }, 'Server closed gracefully')
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => fastify.log.error(err))
    })
  }

  await fastify.listen({ port: config.port, host: config.host })
  fastify.log.info({ evt: 'server.start', port: config.port, host: config.host }, 'server started')

  return fastify
}
