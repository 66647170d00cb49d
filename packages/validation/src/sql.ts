import type { BindParameter } from './types/module.js'
import type { SourceSpan } from './types/span.js'
import { sortDedupSpans } from './types/span.js'

/**
 * Rewrite `:name` placeholders to `$n`. `n` is the position of the name in
 * the sorted, deduplicated name list, so repeated names share an index.
 * Spans are module offsets; `sqlStart` is where `sql` begins in the module.
 */
export function normalizeExtendedSql(
  sql: string,
  sqlStart: number,
  bindParams: readonly SourceSpan<BindParameter>[],
): string {
  const named: SourceSpan<string>[] = []
  for (const param of bindParams) {
    if (param.value.kind === 'extended') {
      named.push({ start: param.start, end: param.end, value: param.value.name })
    }
  }
  const order = sortDedupSpans(named).map((span) => span.value)

  // Replace right to left so earlier offsets stay valid
  let result = sql
  for (const param of [...named].sort((a, b) => b.start - a.start)) {
    const start = param.start - sqlStart
    const end = param.end - sqlStart
    result = `${result.slice(0, start)}$${order.indexOf(param.value) + 1}${result.slice(end)}`
  }
  return result
}
