import type { ValidationError, ValidationErrorVariant } from './errors.js'
import type { ModuleInfo } from './types/module.js'
import type { PreparedField } from './types/validated.js'

export interface SourceLine {
  /** 1-based */
  readonly line: number
  /** 1-based */
  readonly column: number
  readonly text: string
}

/** Locate a UTF-16 code unit offset in `content` by scanning newline boundaries. */
export function computeLine(content: string, pos: number): SourceLine {
  const offset = Math.max(0, Math.min(pos, content.length))
  const before = content.slice(0, offset)
  const lineStart = before.lastIndexOf('\n') + 1
  const newline = content.indexOf('\n', offset)
  const lineEnd = newline === -1 ? content.length : newline
  let line = 1
  for (const ch of before) {
    if (ch === '\n') line++
  }
  const text = content.slice(lineStart, lineEnd)
  return {
    line,
    column: offset - lineStart + 1,
    text: text.endsWith('\r') ? text.slice(0, -1) : text,
  }
}

export function renderDiagnostic(error: ValidationError): string {
  return formatDiagnostic(error.variant, error.info)
}

export function formatDiagnostic(variant: ValidationErrorVariant, info: ModuleInfo): string {
  const head = `Error while validating queries [path: "${info.path}"]:\n`
  const blocks = diagnosticBlocks(variant).map(([pos, messages]) => formatBlock(info, pos, messages))
  return head + blocks.join('\n\n')
}

// --- Messages ---

type Block = readonly [pos: number, messages: readonly string[]]

function diagnosticBlocks(variant: ValidationErrorVariant): Block[] {
  switch (variant.code) {
    case 'AMBIGUOUS_BIND_PARAM':
      return [
        [
          variant.pos,
          [
            'Cannot mix bind parameter syntaxes in the same query.',
            'Please use either named (`:named_ident`) or indexed (`$n`) bind parameters, but not both.',
          ],
        ],
      ]
    case 'INVALID_I16_INDEX':
      return [[variant.pos, ['Index must be between 1 and 32767.']]]
    case 'DUPLICATE_FIELD':
      return [[variant.pos, ['Field name is already used.']]]
    case 'TOO_MANY_BIND_PARAMS':
      return [[variant.pos, [`Index is higher than the number of parameters supplied (${variant.nbParams}).`]]]
    case 'UNUSED_PARAM':
      return [[variant.pos, [`Parameter \`$${variant.index}\` is never used in the query.`]]]
    case 'INVALID_NULLABLE_NAME':
      return [
        [variant.ident.start, [`No ${variant.target} named \`${variant.ident.value.name}\` found for this query.`]],
      ]
    case 'NAMED_STRUCT_INVALID_FIELDS':
      return [
        [
          variant.name.start,
          [
            `This query's named struct \`${variant.name.value}\` has already been used, but the fields don't match.`,
            `Expected fields: ${formatFields(variant.expected)}`,
            `Got fields: ${formatFields(variant.actual)}`,
          ],
        ],
      ]
    case 'DUPLICATE_QUERY_NAME':
      return [
        [variant.name.start, [`A query named \`${variant.name.value}\` already exists.`]],
        [variant.firstDefined.start, [`Query \`${variant.firstDefined.value}\` first defined here.`]],
      ]
    case 'NAMED_STRUCT_IN_PG_QUERY':
      return [
        [
          variant.pos,
          [
            'Named query structs are not allowed when using the PostgreSQL-compatible syntax.',
            'Use anonymous structs instead, or use the extended query syntax.',
          ],
        ],
      ]
    case 'UNKNOWN_NAMED_STRUCT':
      return [[variant.pos, ['Unknown named struct. Named structs must be registered using type annotations.']]]
  }
}

// --- Rendering ---

function formatBlock(info: ModuleInfo, pos: number, messages: readonly string[]): string {
  const { line, column, text } = computeLine(info.content, pos)
  const cursor = `${' '.repeat(column - 1)}^---`
  return ` --> ${line}:${column}\n  | \n  | ${text}\n  | ${cursor}\n  | \n  = ${messages.join('\n  = ')}`
}

function formatFields(fields: readonly PreparedField[]): string {
  if (fields.length === 0) return '(none)'
  return fields
    .map((f) => `\`${f.name}${f.nullable ? '?' : ''}${f.innerNullable ? '[]?' : ''}\``)
    .join(', ')
}
