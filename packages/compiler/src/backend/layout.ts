/**
 * Linear memory layout.
 *
 *   0         null word, never written
 *   8..32     scratch words for host call arguments and results
 *   32..      static data: digests, string bytes
 *   heapBase  bump-allocated heap, 8-byte aligned
 */

import { DIGEST_BYTES, WORD_BYTES } from '../check/types.ts'
import { toHex } from '../domains/hash.ts'
import { utf8 } from '../host/encoding.ts'

export const SCRATCH = {
	key: 8,
	out: 24,
	value: 16,
} as const

export const DATA_OFFSET = 32

export function alignWord(n: number): number {
	return Math.ceil(n / WORD_BYTES) * WORD_BYTES
}

/** A string value is one word: address in the low half, byte length in the high half. */
export function packString(address: number, length: number): bigint {
	return BigInt(address) | (BigInt(length) << 32n)
}

export function unpackString(word: bigint): { address: number; length: number } {
	return { address: Number(word & 0xffffffffn), length: Number((word >> 32n) & 0xffffffffn) }
}

export interface StringRef {
	readonly address: number
	readonly length: number
}

/** Interns static data so equal strings and digests share one address. */
export class DataLayout {
	private readonly chunks: Uint8Array[] = []
	private size = 0
	private readonly interned = new Map<string, number>()

	private place(key: string, bytes: Uint8Array): number {
		const existing = this.interned.get(key)
		if (existing !== undefined) return existing
		const address = DATA_OFFSET + this.size
		const padded = new Uint8Array(alignWord(bytes.length))
		padded.set(bytes)
		this.chunks.push(padded)
		this.size += padded.length
		this.interned.set(key, address)
		return address
	}

	string(text: string): StringRef {
		const bytes = utf8(text)
		return { address: this.place(`s:${text}`, bytes), length: bytes.length }
	}

	digest(bytes: Uint8Array): number {
		if (bytes.length !== DIGEST_BYTES) throw new Error(`digest of ${bytes.length} bytes`)
		return this.place(`d:${toHex(bytes)}`, bytes)
	}

	zeroDigest(): number {
		return this.digest(new Uint8Array(DIGEST_BYTES))
	}

	get byteLength(): number {
		return this.size
	}

	/** First address after the static data. */
	get end(): number {
		return DATA_OFFSET + this.size
	}

	bytes(): Uint8Array {
		const data = new Uint8Array(this.size)
		let offset = 0
		for (const chunk of this.chunks) {
			data.set(chunk, offset)
			offset += chunk.length
		}
		return data
	}
}
