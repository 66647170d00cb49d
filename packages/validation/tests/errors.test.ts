import { describe, expect, it } from 'vitest'
import { formatDiagnostic } from '../src/diagnostics.js'
import { QueryBindError, ValidationError } from '../src/errors.js'
import { moduleInfo } from './fixtures/testModule.js'

describe('QueryBindError', () => {
  it('has code and message', () => {
    const err = new QueryBindError('TEST_CODE', 'test message')
    expect(err.code).toBe('TEST_CODE')
    expect(err.message).toBe('test message')
    expect(err.name).toBe('QueryBindError')
    expect(err).toBeInstanceOf(Error)
  })

  it('toJSON() serializes cause chain', () => {
    const root = new Error('root cause')
    const mid = new QueryBindError('MID', 'mid', { cause: root })
    const top = new QueryBindError('TOP', 'top', { cause: mid })
    expect(top.toJSON().cause).toEqual({
      code: 'MID',
      message: 'mid',
      cause: { message: 'root cause', name: 'Error' },
    })
  })

  it('toJSON() omits cause when undefined', () => {
    expect(new QueryBindError('X', 'msg').toJSON()).toEqual({ code: 'X', message: 'msg' })
  })
})

describe('ValidationError', () => {
  const info = moduleInfo('SELECT $1, :id', 'queries/mixed.sql')

  it('uses the rendered diagnostic as message', () => {
    const variant = { code: 'AMBIGUOUS_BIND_PARAM', pos: 11 } as const
    const err = new ValidationError(variant, info)
    expect(err.code).toBe('VALIDATION_FAILED')
    expect(err.name).toBe('ValidationError')
    expect(err.message).toBe(formatDiagnostic(variant, info))
    expect(err).toBeInstanceOf(QueryBindError)
  })

  it('keeps the module info by reference', () => {
    const err = new ValidationError({ code: 'UNKNOWN_NAMED_STRUCT', pos: 0 }, info)
    expect(err.info).toBe(info)
  })

  it('toJSON() includes path and variant', () => {
    const err = new ValidationError({ code: 'UNUSED_PARAM', pos: 7, index: 1 }, info)
    const parsed = JSON.parse(JSON.stringify(err.toJSON()))
    expect(parsed.code).toBe('VALIDATION_FAILED')
    expect(parsed.path).toBe('queries/mixed.sql')
    expect(parsed.variant).toEqual({ code: 'UNUSED_PARAM', pos: 7, index: 1 })
  })
})
