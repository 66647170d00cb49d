import { ValidationError } from '../errors.js'
import type { ModuleInfo, NullableIdent } from '../types/module.js'
import type { SourceSpan } from '../types/span.js'

// Nullability overrides can only be checked once the statement has been
// described by the database, so these run during type resolution.

/** Result column as reported by the database driver when describing a statement. */
export interface ResultColumn {
  readonly name: string
}

export function checkNullableColumnName(
  info: ModuleInfo,
  nullableCol: SourceSpan<NullableIdent>,
  columns: readonly ResultColumn[],
): ValidationError | null {
  if (columns.some((col) => col.name === nullableCol.value.name)) {
    return null
  }
  return new ValidationError({ code: 'INVALID_NULLABLE_NAME', target: 'column', ident: nullableCol }, info)
}

export function checkNullableParamName(
  info: ModuleInfo,
  nullableParam: SourceSpan<NullableIdent>,
  params: readonly SourceSpan<string>[],
): ValidationError | null {
  if (params.some((param) => param.value === nullableParam.value.name)) {
    return null
  }
  return new ValidationError({ code: 'INVALID_NULLABLE_NAME', target: 'parameter', ident: nullableParam }, info)
}
