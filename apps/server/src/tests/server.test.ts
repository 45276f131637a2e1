import { test, expect, describe, beforeAll, afterAll } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { buildServer, describeResult } from '../server.js'

describe('Server', () => {
  let server: FastifyInstance

  beforeAll(async () => {
    server = await buildServer({ logger: false })
    await server.ready()
  })

  afterAll(async () => {
    await server.close()
  })

  test('GET /health returns 200 and correct response', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/health'
    })

    expect(response.statusCode).toBe(200)

    const body = JSON.parse(response.body)
    expect(body).toHaveProperty('status', 'ok')
    expect(typeof body.uptime).toBe('number')
    expect(new Date(body.timestamp).getTime()).not.toBeNaN()
  })

  test('POST /games/play returns statuses and the final board for a win', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: {
        boardSize: 3,
        numPlayers: 1,
        moves: [[1, 0, 0], [1, 0, 1], [1, 0, 2], [1, 2, 2]],
      }
    })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({
      statuses: [0, 0, 1],
      finished: true,
      winner: 1,
      board: [[1, 1, 1], [0, 0, 0], [0, 0, 0]],
      rendered: '1 1 1\n0 0 0\n0 0 0',
    })
  })

  test('POST /games/play reports an undecided game', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: {
        boardSize: 3,
        numPlayers: 2,
        turnPolicy: 'valid-moves-only',
        moves: [[2, 0, 0], [1, 0, 0], [2, 5, 5]],
      }
    })

    expect(response.statusCode).toBe(200)
    const body = response.json()
    expect(body.statuses).toEqual([-2, 0, -2])
    expect(body.finished).toBe(false)
    expect(body.winner).toBe(null)
  })

  test('POST /games/play rejects malformed move triples', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: { boardSize: 3, numPlayers: 2, moves: [[1, 0]] }
    })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('VALIDATION_FAILED')
  })

  test('POST /games/play does not coerce non-integer move values', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: { boardSize: 3, numPlayers: 1, moves: [[true, '0', null], [1, 0, 1]] }
    })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('VALIDATION_FAILED')
  })

  test('POST /games/play does not coerce a string board size', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: { boardSize: '3', numPlayers: 1, moves: [[1, 0, 0]] }
    })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('VALIDATION_FAILED')
  })

  test('POST /games/play rejects unknown fields', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: { boardSize: 3, numPlayers: 1, moves: [[1, 0, 0]], bogus: 1 }
    })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('VALIDATION_FAILED')
  })

  test('POST /games/play rejects a zero-sized board', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/games/play',
      payload: { boardSize: 0, numPlayers: 2, moves: [] }
    })

    expect(response.statusCode).toBe(400)
    expect(response.json().error).toBe('VALIDATION_FAILED')
  })
})

describe('describeResult', () => {
  test('maps the last status to a winner', () => {
    expect(describeResult([], 3)).toEqual({ finished: false, winner: null })
    expect(describeResult([0, -1], 3)).toEqual({ finished: false, winner: null })
    expect(describeResult([0, 2], 3)).toEqual({ finished: true, winner: 2 })
    expect(describeResult([0, 3], 3)).toEqual({ finished: true, winner: 'draw' })
  })
})
