import { ValidationError } from '../errors.js'
import type {
  BindParameter,
  Dialect,
  ModuleInfo,
  NullableIdent,
  Query,
  QueryAnnotation,
} from '../types/module.js'
import type { SourceSpan } from '../types/span.js'

// ── Wire Protocol Limits ───────────────────────────────────────

/** Parameter indices travel as int16; `$0` does not exist. */
export const MIN_BIND_INDEX = 1
export const MAX_BIND_INDEX = 32767

// ── Dialect ────────────────────────────────────────────────────

/**
 * The first bind parameter decides the dialect; a query without any is
 * treated as extended. Every later parameter must agree.
 */
export function resolveDialect(
  info: ModuleInfo,
  bindParams: readonly SourceSpan<BindParameter>[],
): Dialect | ValidationError {
  const dialect: Dialect = bindParams[0]?.value.kind ?? 'extended'
  for (const param of bindParams) {
    if (param.value.kind !== dialect) {
      return new ValidationError({ code: 'AMBIGUOUS_BIND_PARAM', pos: param.start }, info)
    }
  }
  return dialect
}

// ── Field Lists ────────────────────────────────────────────────

/** Fails at the second occurrence of the first repeated name. Nullability is ignored. */
export function checkDuplicateFields(
  info: ModuleInfo,
  fields: readonly SourceSpan<NullableIdent>[],
): ValidationError | null {
  const seen = new Set<string>()
  for (const field of fields) {
    if (seen.has(field.value.name)) {
      return new ValidationError({ code: 'DUPLICATE_FIELD', pos: field.start }, info)
    }
    seen.add(field.value.name)
  }
  return null
}

// ── PostgreSQL-compatible Queries ──────────────────────────────

export interface ImplicitStructures {
  readonly params: readonly SourceSpan<NullableIdent>[]
  readonly row: readonly SourceSpan<NullableIdent>[]
}

export function guardPgCompatible(
  info: ModuleInfo,
  annotation: QueryAnnotation,
): ImplicitStructures | ValidationError {
  const { param, row } = annotation
  if (param.kind === 'named') {
    return new ValidationError({ code: 'NAMED_STRUCT_IN_PG_QUERY', pos: param.name.start }, info)
  }
  if (row.kind === 'named') {
    return new ValidationError({ code: 'NAMED_STRUCT_IN_PG_QUERY', pos: row.name.start }, info)
  }
  return { params: param.idents, row: row.idents }
}

export function normalizeIndex(
  info: ModuleInfo,
  bindParam: SourceSpan<BindParameter>,
): SourceSpan<number> | ValidationError {
  const { start, end, value } = bindParam
  if (value.kind !== 'pg-compatible') {
    throw new TypeError(`Expected an indexed bind parameter, got ':${value.name}'`)
  }
  if (!Number.isInteger(value.index) || value.index < MIN_BIND_INDEX || value.index > MAX_BIND_INDEX) {
    return new ValidationError({ code: 'INVALID_I16_INDEX', pos: start }, info)
  }
  return { start, end, value: value.index }
}

/** `dedupedIndices` must be sorted ascending; the first index past the parameter count fails. */
export function checkBindParamOverflow(
  info: ModuleInfo,
  params: readonly SourceSpan<NullableIdent>[],
  dedupedIndices: readonly SourceSpan<number>[],
): ValidationError | null {
  const overflow = dedupedIndices.find((index) => index.value > params.length)
  if (overflow !== undefined) {
    return new ValidationError(
      { code: 'TOO_MANY_BIND_PARAMS', pos: overflow.start, nbParams: params.length },
      info,
    )
  }
  return null
}

export function checkUnusedParams(
  info: ModuleInfo,
  params: readonly SourceSpan<NullableIdent>[],
  indices: readonly SourceSpan<number>[],
): ValidationError | null {
  for (const [i, param] of params.entries()) {
    if (!indices.some((index) => index.value === i + 1)) {
      return new ValidationError({ code: 'UNUSED_PARAM', pos: param.start, index: i + 1 }, info)
    }
  }
  return null
}

// ── Query Names ────────────────────────────────────────────────

export function checkQueryNameCollisions(info: ModuleInfo, queries: readonly Query[]): ValidationError | null {
  for (const [i, query] of queries.entries()) {
    const other = queries.find((q, j) => j !== i && q.annotation.name.value === query.annotation.name.value)
    if (other !== undefined) {
      return new ValidationError(
        { code: 'DUPLICATE_QUERY_NAME', name: other.annotation.name, firstDefined: query.annotation.name },
        info,
      )
    }
  }
  return null
}
