/**
 * Source spans. Every HIR node and SSA value carries the span of the source
 * text that produced it so later stages can point back at it.
 */

export interface Span {
	/** Offset of the first character */
	readonly start: number
	/** Offset one past the last character */
	readonly end: number
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
}

/** Span for synthesized nodes with no source text. */
export const NO_SPAN: Span = { column: 1, end: 0, line: 1, start: 0 }

export function formatSpan(span: Span): string {
	return `${span.line}:${span.column}`
}

/** Smallest span covering both inputs. */
export function joinSpans(a: Span, b: Span): Span {
	const first = a.start <= b.start ? a : b
	return {
		column: first.column,
		end: Math.max(a.end, b.end),
		line: first.line,
		start: first.start,
	}
}
