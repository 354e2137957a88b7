/**
 * Fixed-output hashing for domain keys and namespace identifiers.
 *
 * SHA-256 over the UTF-8 bytes of the input. The output depends on nothing
 * but those bytes.
 */

import { createHash } from 'node:crypto'

export function sha256(data: Uint8Array | string): Uint8Array {
	return new Uint8Array(createHash('sha256').update(data).digest())
}

export function toHex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString('hex')
}

/** Lower-case hex SHA-256 of a canonical domain string. */
export function hashDomainKey(canonical: string): string {
	return toHex(sha256(canonical))
}

/** Canonical name of a namespace: `<unit>.<namespace>`. */
export function namespaceKey(unit: string, namespace: string): string {
	return `${unit}.${namespace}`
}

/**
 * The identifier a namespace is passed to the host under: the SHA-256 of its
 * canonical name. Also the `namespace` field of manifest domain entries.
 */
export function namespaceDigest(unit: string, namespace: string): Uint8Array {
	return sha256(namespaceKey(unit, namespace))
}

/**
 * Per-compilation intern table from canonical key to hash, so each distinct
 * key is hashed once.
 */
export class DomainKeyTable {
	private readonly hashes = new Map<string, string>()

	intern(canonical: string): string {
		const existing = this.hashes.get(canonical)
		if (existing !== undefined) return existing
		const hash = hashDomainKey(canonical)
		this.hashes.set(canonical, hash)
		return hash
	}

	/** Canonical string for a hash this table produced. */
	canonicalOf(hash: string): string | undefined {
		for (const [canonical, h] of this.hashes) if (h === hash) return canonical
		return undefined
	}

	get size(): number {
		return this.hashes.size
	}
}
