// Diagnostics
export type { SourceLine } from './diagnostics.js'
export { computeLine, formatDiagnostic, renderDiagnostic } from './diagnostics.js'

// Errors
export type { ValidationErrorCode, ValidationErrorVariant } from './errors.js'
export { QueryBindError, ValidationError } from './errors.js'

// Pipeline
export type { ValidateModulesOptions } from './pipeline.js'
export { assertValid, validateModules } from './pipeline.js'

// SQL
export { normalizeExtendedSql } from './sql.js'

// Types — module
export type {
  BindParameter,
  Dialect,
  ModuleInfo,
  Nullability,
  NullableIdent,
  ParsedModule,
  Query,
  QueryAnnotation,
  QueryDataStructure,
  QuerySql,
  TypeAnnotation,
} from './types/module.js'
// Types — result
export type { DebugLogEntry, ModuleInput, ValidationFailure, ValidationRun } from './types/result.js'
// Types — span
export type { SourceSpan } from './types/span.js'
export { sortDedupSpans } from './types/span.js'
// Types — validated
export type { PreparedField, ValidatedModule, ValidatedQuery } from './types/validated.js'

// Validation
export { validateModule } from './validation/moduleValidator.js'
export type { NamedStructLedger } from './validation/namedStructs.js'
export { checkNamedStructConsistency, resolveNamedStruct, trackNamedStruct } from './validation/namedStructs.js'
export type { ResultColumn } from './validation/nullableNames.js'
export { checkNullableColumnName, checkNullableParamName } from './validation/nullableNames.js'
export { validateQuery } from './validation/queryValidator.js'
export type { ImplicitStructures } from './validation/rules.js'
export {
  checkBindParamOverflow,
  checkDuplicateFields,
  checkQueryNameCollisions,
  checkUnusedParams,
  guardPgCompatible,
  MAX_BIND_INDEX,
  MIN_BIND_INDEX,
  normalizeIndex,
  resolveDialect,
} from './validation/rules.js'
