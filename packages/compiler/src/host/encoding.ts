/**
 * Byte encoding of values crossing the host boundary.
 *
 * Integers and booleans travel as one 8-byte little-endian word (signed
 * values in two's complement), strings as their UTF-8 bytes and digests as
 * their 32 bytes.
 */

import { DIGEST_BYTES, type Type, WORD_BYTES, wrapInt } from '../check/types.ts'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export function wordToBytes(word: bigint): Uint8Array {
	const bytes = new Uint8Array(WORD_BYTES)
	new DataView(bytes.buffer).setBigUint64(0, BigInt.asUintN(64, word), true)
	return bytes
}

/** Little-endian, zero-extended when shorter than a word. */
export function bytesToWord(bytes: Uint8Array): bigint {
	let word = 0n
	for (let i = Math.min(bytes.length, WORD_BYTES) - 1; i >= 0; i--) {
		word = (word << 8n) | BigInt(bytes[i] ?? 0)
	}
	return word
}

export function utf8(text: string): Uint8Array {
	return encoder.encode(text)
}

export function fromUtf8(bytes: Uint8Array): string {
	return decoder.decode(bytes)
}

/** Canonical value of a 64-bit word read for `type`. */
export function wordToInt(type: Type, word: bigint): bigint {
	if (type.kind !== 'int') return BigInt.asUintN(64, word)
	return wrapInt(type, type.signed ? BigInt.asIntN(64, word) : BigInt.asUintN(64, word))
}

export function fitDigest(bytes: Uint8Array): Uint8Array {
	if (bytes.length === DIGEST_BYTES) return bytes
	const digest = new Uint8Array(DIGEST_BYTES)
	digest.set(bytes.subarray(0, DIGEST_BYTES))
	return digest
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	return a.length === b.length && a.every((byte, i) => byte === b[i])
}
