/**
 * A parsed value paired with its location in the module source.
 * `start` and `end` are UTF-16 code unit indices into `ModuleInfo.content`
 * (plain string indices, not UTF-8 byte offsets), half-open. Parsers must
 * produce offsets in this unit; diagnostics count columns in it too.
 */
export interface SourceSpan<T> {
  readonly start: number
  readonly end: number
  readonly value: T
}

/** Ordering on span values. Strings compare by UTF-16 code unit, numbers numerically. */
export function compareSpanValues<T extends string | number>(a: SourceSpan<T>, b: SourceSpan<T>): number {
  if (a.value < b.value) return -1
  if (a.value > b.value) return 1
  return 0
}

/**
 * Value-sorted copy with repeated values removed. The sort is stable, so the
 * earliest occurrence of each value is the one kept.
 */
export function sortDedupSpans<T extends string | number>(spans: readonly SourceSpan<T>[]): SourceSpan<T>[] {
  const sorted = [...spans].sort(compareSpanValues)
  return sorted.filter((span, i) => i === 0 || sorted[i - 1]?.value !== span.value)
}
