import { describe, expect, it } from 'vitest'
import { normalizeExtendedSql } from '../src/sql.js'
import { extended, indexed, offsetOf } from './fixtures/testModule.js'

describe('normalizeExtendedSql', () => {
  const src = '--! q\nSELECT * FROM t WHERE b = :beta AND a = :alpha OR b = :beta;'
  const sql = 'SELECT * FROM t WHERE b = :beta AND a = :alpha OR b = :beta;'
  const sqlStart = offsetOf(src, sql)

  it('numbers placeholders by sorted name and reuses indices', () => {
    const params = [extended(src, ':beta'), extended(src, ':alpha'), extended(src, ':beta', 1)]
    expect(normalizeExtendedSql(sql, sqlStart, params)).toBe('SELECT * FROM t WHERE b = $2 AND a = $1 OR b = $2;')
  })

  it('leaves text without placeholders unchanged', () => {
    expect(normalizeExtendedSql('SELECT 1;', 0, [])).toBe('SELECT 1;')
  })

  it('ignores indexed parameters', () => {
    const text = 'SELECT $1;'
    expect(normalizeExtendedSql(text, 0, [indexed(text, '$1')])).toBe('SELECT $1;')
  })
})
