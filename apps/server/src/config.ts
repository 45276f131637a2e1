import { createConfigError } from './errors.js'
import { TURN_POLICIES, type TurnPolicy } from './engine/types.js'

// Upper bounds for boards evaluated over HTTP
export const MAX_BOARD_SIZE = 100
export const MAX_PLAYERS = 100

export interface AppConfig {
  port: number
  host: string
  logLevel: string
  boardSize: number
  numPlayers: number
  turnPolicy: TurnPolicy
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw === '') {
    return fallback
  }
  const value = parseInt(raw, 10)
  if (!/^\d+$/.test(raw.trim()) || value < 1) {
    throw createConfigError(key, raw)
  }
  return value
}

export function parseTurnPolicy(raw: string, key: string = 'TURN_POLICY'): TurnPolicy {
  const policy = TURN_POLICIES.find(candidate => candidate === raw)
  if (!policy) {
    throw createConfigError(key, raw)
  }
  return policy
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveInt(env, 'PORT', 9001),
    host: env.HOST || '0.0.0.0',
    logLevel: env.LOG_LEVEL || 'info',
    boardSize: readPositiveInt(env, 'BOARD_SIZE', 3),
    numPlayers: readPositiveInt(env, 'NUM_PLAYERS', 2),
    turnPolicy: parseTurnPolicy(env.TURN_POLICY || 'every-attempt'),
  }
}
