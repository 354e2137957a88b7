/**
 * Interpretation of function annotations.
 *
 * The front end keeps `#[...]` text raw; this module parses it with a small
 * grammar of its own: a name with an optional list of string arguments.
 *
 * - `#[reads("ns:key", ...)]`, `#[writes(...)]`: declared domains
 * - `#[pure]`: no state effects, trusted without analysis
 * - `#[payable]`: accepts a call value
 * - `#[proof("id")]`: links an external proof obligation
 */

import * as ohm from 'ohm-js'
import type { CompilationContext } from '../core/context.ts'
import type { AstAnnotation } from '../front/ast.ts'
import type { StorageNamespace } from '../hir/hir.ts'
import { type DomainKey, keyedDomain, scalarDomain, wildcardDomain } from './domain.ts'

const annotationGrammar = ohm.grammar(String.raw`
Annotation {
  Annotation = name Arguments?
  Arguments = "(" ListOf<stringLit, ","> ")"
  name = (letter | "_") (alnum | "_")*
  stringLit = "\"" (~"\"" any)* "\""
}
`)

const annotationSemantics = annotationGrammar.createSemantics().addOperation<ParsedAnnotation>('parsed', {
	Annotation(name: ohm.Node, args: ohm.Node) {
		const list = args.children[0]
		return {
			args: list !== undefined ? list['strings']() : null,
			name: name.sourceString,
		}
	},
})

annotationSemantics.addOperation<string[]>('strings', {
	Arguments(_open: ohm.Node, list: ohm.Node, _close: ohm.Node) {
		return list.asIteration().children.map((s: ohm.Node) => s.sourceString.slice(1, -1))
	},
})

interface ParsedAnnotation {
	readonly name: string
	/** Null when written without parentheses */
	readonly args: string[] | null
}

export interface FunctionAnnotations {
	/** Declared read set, replacing the computed one */
	readonly reads: readonly DomainKey[] | null
	/** Declared write set, replacing the computed one */
	readonly writes: readonly DomainKey[] | null
	readonly pure: boolean
	readonly payable: boolean
	readonly proofs: readonly string[]
}

export const NO_ANNOTATIONS: FunctionAnnotations = {
	payable: false,
	proofs: [],
	pure: false,
	reads: null,
	writes: null,
}

export function parseAnnotation(text: string): ParsedAnnotation | null {
	const result = annotationGrammar.match(text)
	if (result.failed()) return null
	return annotationSemantics(result)['parsed']()
}

/**
 * A declared domain: `ns`, `ns:key` or `ns:*`. A bare keyed namespace
 * stands for all of its keys. Null when malformed.
 */
export function parseDomainRef(
	text: string,
	storage: ReadonlyMap<string, StorageNamespace>
): { domain: DomainKey; known: boolean } | null {
	const colon = text.indexOf(':')
	const namespace = colon < 0 ? text : text.slice(0, colon)
	if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(namespace)) return null
	const ns = storage.get(namespace)
	const known = ns !== undefined

	if (colon < 0) {
		const keyed = ns !== undefined && ns.keyType !== null
		return { domain: keyed ? wildcardDomain(namespace) : scalarDomain(namespace), known }
	}
	const key = text.slice(colon + 1)
	if (key.length === 0) return null
	return { domain: key === '*' ? wildcardDomain(namespace) : keyedDomain(namespace, key), known }
}

/**
 * Interpret the annotations of one function, reporting problems against it.
 * Returns null when any annotation is malformed.
 */
export function interpretAnnotations(
	context: CompilationContext,
	functionName: string,
	annotations: readonly AstAnnotation[],
	storage: ReadonlyMap<string, StorageNamespace>
): FunctionAnnotations | null {
	let reads: DomainKey[] | null = null
	let writes: DomainKey[] | null = null
	let pure = false
	let payable = false
	const proofs: string[] = []
	let valid = true

	const malformed = (annotation: AstAnnotation, detail: string): void => {
		context.emit('TEDOM002', annotation.span, { detail }, { functionName })
		valid = false
	}

	for (const annotation of annotations) {
		const parsed = parseAnnotation(annotation.text)
		if (parsed === null) {
			malformed(annotation, `cannot parse '#[${annotation.text}]'`)
			continue
		}
		const { args, name } = parsed

		switch (name) {
			case 'reads':
			case 'writes': {
				if (args === null) {
					malformed(annotation, `#[${name}] needs a list of domains`)
					continue
				}
				const domains: DomainKey[] = []
				for (const arg of args) {
					const ref = parseDomainRef(arg, storage)
					if (ref === null) {
						malformed(annotation, `'${arg}' is not a domain`)
						continue
					}
					if (!ref.known) {
						context.emit('TEDOM053', annotation.span, { namespace: ref.domain.namespace }, { functionName })
					}
					domains.push(ref.domain)
				}
				if (name === 'reads') reads = [...(reads ?? []), ...domains]
				else writes = [...(writes ?? []), ...domains]
				continue
			}
			case 'pure':
			case 'payable':
				if (args !== null) {
					malformed(annotation, `#[${name}] takes no arguments`)
					continue
				}
				if (name === 'pure') pure = true
				else payable = true
				continue
			case 'proof':
				if (args === null || args.length !== 1) {
					malformed(annotation, '#[proof] takes one obligation id')
					continue
				}
				proofs.push(...args)
				continue
			default:
				context.emit('TEDOM054', annotation.span, { name }, { functionName })
		}
	}

	return valid ? { payable, proofs, pure, reads, writes } : null
}
