import { describe, it, expect } from 'vitest'
import { parseMoves, parseMoveTriple } from '../utils/moveParser.js'
import { EngineError, EngineErrorCode } from '../errors.js'

describe('Move Parser', () => {
  it('should parse one triple per line', () => {
    expect(parseMoves('1 0 0\n2 1 1\n')).toEqual([
      { player: 1, location: { row: 0, col: 0 } },
      { player: 2, location: { row: 1, col: 1 } },
    ])
  })

  it('should trim lines and accept any whitespace between tokens', () => {
    expect(parseMoves('  3\t2   4  \r\n')).toEqual([
      { player: 3, location: { row: 2, col: 4 } },
    ])
  })

  it('should skip blank lines and comments', () => {
    expect(parseMoves('# header\n\n   \n1 2 0\n# trailing')).toEqual([
      { player: 1, location: { row: 2, col: 0 } },
    ])
  })

  it('should keep negative coordinates for the engine to reject', () => {
    expect(parseMoves('1 -1 0')).toEqual([
      { player: 1, location: { row: -1, col: 0 } },
    ])
  })

  it('should reject lines without exactly three tokens', () => {
    expect(() => parseMoves('1 0 0\n1 0')).toThrow('Line 2: expected 3 integers, got 2 tokens')
    expect(() => parseMoves('1 0 0 0')).toThrow('Line 1: expected 3 integers, got 4 tokens')
  })

  it('should reject non-integer tokens with the line number', () => {
    try {
      parseMoves('\n\n1 x 0')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(EngineError)
      const engineError = err as EngineError
      expect(engineError.code).toBe(EngineErrorCode.INVALID_MOVE_INPUT)
      expect(engineError.message).toBe('Line 3: not an integer: x')
      expect(engineError.metadata).toEqual({ line: 3 })
    }

    expect(() => parseMoves('1 0.5 0')).toThrow('Line 1: not an integer: 0.5')
  })

  it('should return no moves for empty input', () => {
    expect(parseMoves('')).toEqual([])
  })

  it('should convert a numeric triple', () => {
    expect(parseMoveTriple([2, 4, 1])).toEqual({ player: 2, location: { row: 4, col: 1 } })
  })
})
