import type { ModuleInfo, NullableIdent, QueryDataStructure, TypeAnnotation } from './module.js'
import type { SourceSpan } from './span.js'

export type ValidatedQuery =
  | {
      readonly kind: 'pg-compatible'
      readonly name: SourceSpan<string>
      readonly params: readonly SourceSpan<NullableIdent>[]
      readonly row: readonly SourceSpan<NullableIdent>[]
      readonly sql: string
    }
  | {
      readonly kind: 'extended'
      readonly name: SourceSpan<string>
      readonly params: QueryDataStructure
      /** Sorted, duplicate-free bind parameter names. */
      readonly bindParams: readonly SourceSpan<string>[]
      readonly row: QueryDataStructure
      readonly sql: string
    }

export interface ValidatedModule {
  readonly info: ModuleInfo
  readonly paramTypes: readonly TypeAnnotation[]
  readonly rowTypes: readonly TypeAnnotation[]
  readonly dbTypes: readonly TypeAnnotation[]
  readonly queries: readonly ValidatedQuery[]
}

/** Field of a named struct after its type has been resolved against the database. */
export interface PreparedField {
  readonly name: string
  readonly nullable: boolean
  /** Elements of an array column may be null. */
  readonly innerNullable: boolean
}
