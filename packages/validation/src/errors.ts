import { formatDiagnostic } from './diagnostics.js'
import type { ModuleInfo, NullableIdent } from './types/module.js'
import type { SourceSpan } from './types/span.js'
import type { PreparedField } from './types/validated.js'

// --- Base Error ---

export class QueryBindError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'QueryBindError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Validation Error ---

export type ValidationErrorVariant =
  | { readonly code: 'AMBIGUOUS_BIND_PARAM'; readonly pos: number }
  | { readonly code: 'INVALID_I16_INDEX'; readonly pos: number }
  | { readonly code: 'DUPLICATE_FIELD'; readonly pos: number }
  | { readonly code: 'TOO_MANY_BIND_PARAMS'; readonly pos: number; readonly nbParams: number }
  | { readonly code: 'UNUSED_PARAM'; readonly pos: number; readonly index: number }
  | {
      readonly code: 'INVALID_NULLABLE_NAME'
      readonly target: 'column' | 'parameter'
      readonly ident: SourceSpan<NullableIdent>
    }
  | {
      readonly code: 'NAMED_STRUCT_INVALID_FIELDS'
      readonly name: SourceSpan<string>
      readonly expected: readonly PreparedField[]
      readonly actual: readonly PreparedField[]
    }
  | {
      readonly code: 'DUPLICATE_QUERY_NAME'
      readonly name: SourceSpan<string>
      readonly firstDefined: SourceSpan<string>
    }
  | { readonly code: 'NAMED_STRUCT_IN_PG_QUERY'; readonly pos: number }
  | { readonly code: 'UNKNOWN_NAMED_STRUCT'; readonly pos: number }

export type ValidationErrorCode = ValidationErrorVariant['code']

/**
 * A query module was rejected. The message is the rendered diagnostic, so
 * printing the error is enough to report it.
 */
export class ValidationError extends QueryBindError {
  declare readonly code: 'VALIDATION_FAILED'
  readonly variant: ValidationErrorVariant
  readonly info: ModuleInfo

  constructor(variant: ValidationErrorVariant, info: ModuleInfo) {
    super('VALIDATION_FAILED', formatDiagnostic(variant, info))
    this.name = 'ValidationError'
    this.variant = variant
    this.info = info
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.info.path,
      variant: this.variant,
    }
  }
}

// --- Helpers ---

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof QueryBindError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}
