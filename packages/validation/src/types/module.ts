import type { SourceSpan } from './span.js'

// --- Module Context ---

/**
 * Source of one query module. A single instance is shared by reference
 * with every error raised for that module.
 */
export interface ModuleInfo {
  readonly path: string
  readonly content: string
}

// --- Bind Parameters ---

export type Dialect = 'pg-compatible' | 'extended'

/** `$n` (indexed) or `:name` (named) placeholder. */
export type BindParameter =
  | { readonly kind: 'pg-compatible'; readonly index: number }
  | { readonly kind: 'extended'; readonly name: string }

// --- Annotations ---

export type Nullability = 'nullable' | 'inner-nullable'

export interface NullableIdent {
  readonly name: string
  readonly nullability?: Nullability | undefined
}

export type QueryDataStructure =
  | { readonly kind: 'implicit'; readonly idents: readonly SourceSpan<NullableIdent>[] }
  | { readonly kind: 'named'; readonly name: SourceSpan<string> }

export interface QueryAnnotation {
  readonly name: SourceSpan<string>
  readonly param: QueryDataStructure
  readonly row: QueryDataStructure
}

/** Named struct declaration, referenced by name from query annotations. */
export interface TypeAnnotation {
  readonly name: SourceSpan<string>
  readonly fields: readonly SourceSpan<NullableIdent>[]
}

// --- Queries ---

export interface QuerySql {
  readonly bindParams: readonly SourceSpan<BindParameter>[]
  readonly text: string
}

export interface Query {
  readonly annotation: QueryAnnotation
  readonly sql: QuerySql
  /** Offset of `sql.text` within the module content. */
  readonly sqlStart: number
}

export interface ParsedModule {
  readonly paramTypes: readonly TypeAnnotation[]
  readonly rowTypes: readonly TypeAnnotation[]
  readonly dbTypes: readonly TypeAnnotation[]
  readonly queries: readonly Query[]
}
