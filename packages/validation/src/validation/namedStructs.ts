import { ValidationError } from '../errors.js'
import type { ModuleInfo, NullableIdent, TypeAnnotation } from '../types/module.js'
import type { SourceSpan } from '../types/span.js'
import type { PreparedField } from '../types/validated.js'

/** Named struct fields seen so far, keyed by struct name. */
export type NamedStructLedger = ReadonlyMap<string, readonly PreparedField[]>

export function resolveNamedStruct(
  info: ModuleInfo,
  registry: readonly TypeAnnotation[],
  name: SourceSpan<string>,
): readonly SourceSpan<NullableIdent>[] | ValidationError {
  const declared = registry.find((ty) => ty.name.value === name.value)
  if (declared === undefined) {
    return new ValidationError({ code: 'UNKNOWN_NAMED_STRUCT', pos: name.start }, info)
  }
  return declared.fields
}

/**
 * Every use of a named struct must resolve to the same fields: equal length,
 * and equal as multisets of (name, nullable, innerNullable).
 */
export function checkNamedStructConsistency(
  info: ModuleInfo,
  name: SourceSpan<string>,
  expected: readonly PreparedField[],
  actual: readonly PreparedField[],
): ValidationError | null {
  if (expected.length === actual.length && sameFields(expected, actual)) {
    return null
  }
  return new ValidationError({ code: 'NAMED_STRUCT_INVALID_FIELDS', name, expected, actual }, info)
}

/**
 * Record a use of a named struct. The first use registers its fields; later
 * uses are checked against them. Returns the updated ledger without touching
 * the one passed in.
 */
export function trackNamedStruct(
  info: ModuleInfo,
  ledger: NamedStructLedger,
  name: SourceSpan<string>,
  fields: readonly PreparedField[],
): NamedStructLedger | ValidationError {
  const previous = ledger.get(name.value)
  if (previous !== undefined) {
    return checkNamedStructConsistency(info, name, previous, fields) ?? ledger
  }
  return new Map(ledger).set(name.value, fields)
}

function sameFields(a: readonly PreparedField[], b: readonly PreparedField[]): boolean {
  const counts = new Map<string, number>()
  for (const field of a) {
    const key = fieldKey(field)
    counts.set(key, (counts.get(key) ?? 0) + 1)
  }
  for (const field of b) {
    const key = fieldKey(field)
    const count = counts.get(key) ?? 0
    if (count === 0) return false
    counts.set(key, count - 1)
  }
  return true
}

function fieldKey(field: PreparedField): string {
  return `${field.nullable ? '?' : '!'}${field.innerNullable ? '?' : '!'}${field.name}`
}
