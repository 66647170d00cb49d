import { ValidationError } from '../errors.js'
import { normalizeExtendedSql } from '../sql.js'
import type { ModuleInfo, Query } from '../types/module.js'
import type { SourceSpan } from '../types/span.js'
import { sortDedupSpans } from '../types/span.js'
import type { ValidatedQuery } from '../types/validated.js'
import {
  checkBindParamOverflow,
  checkDuplicateFields,
  checkUnusedParams,
  guardPgCompatible,
  normalizeIndex,
  resolveDialect,
} from './rules.js'

// --- Main Validation ---

/** Validate one query. Stops at the first failed check. */
export function validateQuery(info: ModuleInfo, query: Query): ValidatedQuery | ValidationError {
  const { annotation, sql } = query

  if (annotation.param.kind === 'implicit') {
    const err = checkDuplicateFields(info, annotation.param.idents)
    if (err !== null) return err
  }
  if (annotation.row.kind === 'implicit') {
    const err = checkDuplicateFields(info, annotation.row.idents)
    if (err !== null) return err
  }

  const dialect = resolveDialect(info, sql.bindParams)
  if (dialect instanceof ValidationError) return dialect

  if (dialect === 'extended') {
    const names: SourceSpan<string>[] = []
    for (const param of sql.bindParams) {
      if (param.value.kind === 'extended') {
        names.push({ start: param.start, end: param.end, value: param.value.name })
      }
    }
    return {
      kind: 'extended',
      name: annotation.name,
      params: annotation.param,
      bindParams: sortDedupSpans(names),
      row: annotation.row,
      sql: normalizeExtendedSql(sql.text, query.sqlStart, sql.bindParams),
    }
  }

  const indices: SourceSpan<number>[] = []
  for (const param of sql.bindParams) {
    const index = normalizeIndex(info, param)
    if (index instanceof ValidationError) return index
    indices.push(index)
  }
  const dedupedIndices = sortDedupSpans(indices)

  const structures = guardPgCompatible(info, annotation)
  if (structures instanceof ValidationError) return structures

  const overflow = checkBindParamOverflow(info, structures.params, dedupedIndices)
  if (overflow !== null) return overflow
  const unused = checkUnusedParams(info, structures.params, indices)
  if (unused !== null) return unused

  return {
    kind: 'pg-compatible',
    name: annotation.name,
    params: structures.params,
    row: structures.row,
    sql: sql.text,
  }
}
