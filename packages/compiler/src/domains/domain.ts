/**
 * Domain keys, hashed domain entries and the conflict rule.
 *
 * Canonical forms:
 * - scalar namespace: `<unit>.<ns>`
 * - one key: `<unit>.<ns>:<key>`
 * - whole namespace: `<unit>.<ns>:*`
 */

import type { DomainKeyTable } from './hash.ts'
import { hashDomainKey, namespaceKey } from './hash.ts'

/** A domain before hashing. `key` is null for scalar namespaces. */
export interface DomainKey {
	readonly namespace: string
	readonly key: string | null
	readonly wildcard: boolean
}

/** A hashed domain as it appears in sets and the manifest. */
export interface DomainEntry {
	readonly hash: string
	/** Hash of `<unit>.<ns>`, shared by every key of the namespace */
	readonly namespace: string
	readonly wildcard: boolean
}

export interface DomainSet {
	readonly reads: readonly DomainEntry[]
	readonly writes: readonly DomainEntry[]
}

export const EMPTY_DOMAIN_SET: DomainSet = { reads: [], writes: [] }

export function keyedDomain(namespace: string, key: string): DomainKey {
	return { key, namespace, wildcard: false }
}

export function scalarDomain(namespace: string): DomainKey {
	return { key: null, namespace, wildcard: false }
}

export function wildcardDomain(namespace: string): DomainKey {
	return { key: null, namespace, wildcard: true }
}

export function canonicalDomain(unit: string, domain: DomainKey): string {
	const base = namespaceKey(unit, domain.namespace)
	if (domain.wildcard) return `${base}:*`
	return domain.key === null ? base : `${base}:${domain.key}`
}

/** Human form used in diagnostics and annotations: `ns`, `ns:key` or `ns:*`. */
export function formatDomain(domain: DomainKey): string {
	if (domain.wildcard) return `${domain.namespace}:*`
	return domain.key === null ? domain.namespace : `${domain.namespace}:${domain.key}`
}

export function toEntry(unit: string, domain: DomainKey, table?: DomainKeyTable): DomainEntry {
	const hash = (canonical: string): string => (table !== undefined ? table.intern(canonical) : hashDomainKey(canonical))
	return {
		hash: hash(canonicalDomain(unit, domain)),
		namespace: hash(namespaceKey(unit, domain.namespace)),
		wildcard: domain.wildcard,
	}
}

/** Sorted by hash, without duplicates. */
export function normalizeEntries(entries: Iterable<DomainEntry>): DomainEntry[] {
	const byHash = new Map<string, DomainEntry>()
	for (const entry of entries) byHash.set(entry.hash, entry)
	return [...byHash.values()].sort((a, b) => (a.hash < b.hash ? -1 : a.hash > b.hash ? 1 : 0))
}

export function unionSets(...sets: readonly DomainSet[]): DomainSet {
	return {
		reads: normalizeEntries(sets.flatMap((s) => s.reads)),
		writes: normalizeEntries(sets.flatMap((s) => s.writes)),
	}
}

export function setsEqual(a: DomainSet, b: DomainSet): boolean {
	const same = (x: readonly DomainEntry[], y: readonly DomainEntry[]): boolean =>
		x.length === y.length && x.every((e, i) => e.hash === y[i]?.hash)
	return same(a.reads, b.reads) && same(a.writes, b.writes)
}

/** Equal, or one is the wildcard of the other's namespace. */
export function entriesOverlap(a: DomainEntry, b: DomainEntry): boolean {
	if (a.hash === b.hash) return true
	return a.namespace === b.namespace && (a.wildcard || b.wildcard)
}

/** Whether `cover` includes every key `entry` stands for. */
export function entryCovers(cover: DomainEntry, entry: DomainEntry): boolean {
	return cover.hash === entry.hash || (cover.wildcard && cover.namespace === entry.namespace)
}

export function isCovered(entry: DomainEntry, by: readonly DomainEntry[]): boolean {
	return by.some((cover) => entryCovers(cover, entry))
}

function anyOverlap(xs: readonly DomainEntry[], ys: readonly DomainEntry[]): boolean {
	return xs.some((x) => ys.some((y) => entriesOverlap(x, y)))
}

/**
 * Two executions conflict when their domains overlap and at least one side
 * of the overlap writes. Reads never conflict with reads.
 */
export function conflicts(a: DomainSet, b: DomainSet): boolean {
	return anyOverlap(a.writes, b.writes) || anyOverlap(a.writes, b.reads) || anyOverlap(a.reads, b.writes)
}
