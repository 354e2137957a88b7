import assert from 'node:assert'
import { describe, it } from 'node:test'
import { analyzeDomains, type DomainAnalysis, type DomainEntry } from '../../src/domains/index.ts'
import { lowerToSsa, messages } from '../helpers.ts'

const STORAGE = `unit bank;
storage {
  total: u64,
  acct: map<string, u64>,
  nonce: map<u64, u64>,
}
`

function analyze(source: string, options?: Parameters<typeof analyzeDomains>[2]) {
	const { context, module } = lowerToSsa(`${STORAGE}${source}`)
	const analysis = analyzeDomains(context, module, options)
	return { analysis, context }
}

function labels(analysis: DomainAnalysis, entries: readonly DomainEntry[]): string[] {
	return entries.map((e) => analysis.labels.get(e.hash) ?? e.hash).sort()
}

function effectiveOf(analysis: DomainAnalysis, name: string): { reads: string[]; writes: string[] } {
	const fn = analysis.functions.get(name)
	assert.ok(fn)
	return { reads: labels(analysis, fn.effective.reads), writes: labels(analysis, fn.effective.writes) }
}

describe('domains/analyzer', () => {
	describe('local pass', () => {
		it('should record scalar reads and writes', () => {
			const { analysis } = analyze('fn touch() { storage.total = storage.total + 1; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'touch'), { reads: ['total'], writes: ['total'] })
		})

		it('should resolve constant keys', () => {
			const { analysis } = analyze('fn pay_bob() { storage.acct["bob"] = 5; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'pay_bob'), { reads: [], writes: ['acct:bob'] })
		})

		it('should fold arithmetic on constant keys', () => {
			const { analysis } = analyze('fn f() { storage.nonce[3 + 4] = 1; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'f').writes, ['nonce:7'])
		})

		it('should enumerate the constant inputs of a phi', () => {
			const { analysis } = analyze('fn f(c: bool) { var k = 1; if c { k = 2; } storage.nonce[k] = 0; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'f').writes, ['nonce:1', 'nonce:2'])
		})

		it('should read keys through the fields of a struct built in place', () => {
			const { analysis } = analyze('copy struct K { k: u64 }\nfn f() { let s = K { k: 3 }; storage.nonce[s.k] = 1; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'f').writes, ['nonce:3'])
		})

		it('should count exists checks as reads', () => {
			const { analysis } = analyze('fn f() -> bool { return storage.acct.contains("carol"); }')
			assert.deepStrictEqual(effectiveOf(analysis, 'f'), { reads: ['acct:carol'], writes: [] })
		})
	})

	describe('dynamic keys', () => {
		it('should coarsen a dynamic key to the namespace wildcard', () => {
			const { analysis, context } = analyze('fn bump(who: u64) { storage.nonce[who] = 1; }')
			assert.deepStrictEqual(effectiveOf(analysis, 'bump').writes, ['nonce:*'])
			assert.deepStrictEqual(messages(context, 'TEDOM050'), [
				"storage key for 'nonce' is dynamic; access coarsened to 'nonce:*'",
			])
			assert.strictEqual(analysis.failed.size, 0)
		})

		it('should coarsen a key read from a field written after construction', () => {
			const { analysis, context } = analyze(`copy struct K { k: u64 }
fn direct(who: u64) { var s = K { k: 1 }; s.k = who; storage.nonce[s.k] = 7; }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'direct').writes, ['nonce:*'])
			assert.deepStrictEqual(messages(context, 'TEDOM050'), [
				"storage key for 'nonce' is dynamic; access coarsened to 'nonce:*'",
			])
		})

		it('should coarsen a key read from a struct a callee may write', () => {
			const { analysis } = analyze(`copy struct K { k: u64 }
fn setk(mut s: K, who: u64) { s.k = who; }
fn viacall(who: u64) { var s = K { k: 1 }; setk(s, who); storage.nonce[s.k] = 7; }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'viacall').writes, ['nonce:*'])
		})

		it('should coarsen a phi with more keys than the limit allows', () => {
			const { analysis } = analyze('fn f(c: bool) { var k = 1; if c { k = 2; } storage.nonce[k] = 0; }', {
				dynamicKeyPolicy: 'coarsen',
				maxEnumeratedKeys: 1,
			})
			assert.deepStrictEqual(effectiveOf(analysis, 'f').writes, ['nonce:*'])
		})

		it('should reject a dynamic key under the strict policy', () => {
			const { analysis, context } = analyze('fn bump(who: u64) { storage.nonce[who] = 1; }', {
				dynamicKeyPolicy: 'reject',
				maxEnumeratedKeys: 8,
			})
			assert.deepStrictEqual(messages(context, 'TEDOM001'), ["storage key for 'nonce' cannot be resolved statically"])
			assert.deepStrictEqual([...analysis.failed], ['bump'])
			assert.ok(context.hasErrors())
		})
	})

	describe('aggregation', () => {
		it('should include the domains of callees', () => {
			const { analysis } = analyze(`fn touch() { storage.total = storage.total + 1; }
fn pay_bob() { storage.acct["bob"] = 5; }
fn outer() { pay_bob(); touch(); }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'outer'), { reads: ['total'], writes: ['acct:bob', 'total'] })
			assert.deepStrictEqual(analysis.functions.get('outer')?.local, { reads: [], writes: [] })
		})

		it('should reach a fixpoint over mutual recursion', () => {
			const { analysis } = analyze(`fn a(n: u64) { if n > 0 { b(n - 1); } storage.total = 1; }
fn b(n: u64) { a(n); storage.acct["x"] = 1; }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'a').writes, ['acct:x', 'total'])
			assert.deepStrictEqual(effectiveOf(analysis, 'b').writes, ['acct:x', 'total'])
			assert.strictEqual(analysis.components, 1)
		})

		it('should trust pure functions without looking at their bodies', () => {
			const { analysis } = analyze(`#[pure]
fn p() { storage.total = 1; }
fn q() { p(); }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'p'), { reads: [], writes: [] })
			assert.deepStrictEqual(effectiveOf(analysis, 'q'), { reads: [], writes: [] })
		})
	})

	describe('declared domains', () => {
		it('should replace the computed set and check it against the body', () => {
			const { analysis, context } = analyze(`#[writes("acct:alice")]
fn pay() { storage.acct["bob"] = 5; }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'pay').writes, ['acct:alice'])
			assert.deepStrictEqual(messages(context, 'TEDOM051'), [
				"'pay' writes 'acct:bob', which its declared domains do not cover",
			])
			assert.deepStrictEqual(messages(context, 'TEDOM052'), ["'pay' declares writes of 'acct:alice' but never touches it"])
			assert.strictEqual(analysis.functions.get('pay')?.declared, true)
		})

		it('should let callers see the declared set', () => {
			const { analysis } = analyze(`#[writes("acct:alice")]
fn pay() { storage.acct["bob"] = 5; }
fn caller_of_pay() { pay(); }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'caller_of_pay').writes, ['acct:alice'])
		})

		it('should read a bare keyed namespace as all of its keys', () => {
			const { analysis, context } = analyze(`#[writes("acct")]
fn pay() { storage.acct["bob"] = 5; }`)
			assert.deepStrictEqual(effectiveOf(analysis, 'pay').writes, ['acct:*'])
			assert.deepStrictEqual(messages(context, 'TEDOM051'), [])
			assert.deepStrictEqual(messages(context, 'TEDOM052'), [])
		})

		it('should accept writes declared for a read', () => {
			const { context } = analyze(`#[reads()]
#[writes("total")]
fn touch() { storage.total = storage.total + 1; }`)
			assert.deepStrictEqual(messages(context, 'TEDOM051'), [])
		})
	})

	describe('annotations', () => {
		it('should reject an annotation that does not parse', () => {
			const { analysis, context } = analyze('#[reads(acct)]\nfn f() {}')
			assert.deepStrictEqual(messages(context, 'TEDOM002'), ["malformed annotation: cannot parse '#[reads(acct)]'"])
			assert.deepStrictEqual([...analysis.failed], ['f'])
		})

		it('should reject a malformed domain', () => {
			const { context } = analyze('#[writes("acct:")]\nfn f() {}')
			assert.deepStrictEqual(messages(context, 'TEDOM002'), ["malformed annotation: 'acct:' is not a domain"])
		})

		it('should warn about unknown namespaces', () => {
			const { context } = analyze('#[reads("ghost")]\nfn f() {}')
			assert.deepStrictEqual(messages(context, 'TEDOM053'), ["annotation names unknown storage namespace 'ghost'"])
		})

		it('should warn about annotations it does not interpret', () => {
			const { analysis, context } = analyze('#[inline]\nfn f() {}')
			assert.deepStrictEqual(messages(context, 'TEDOM054'), ["unknown annotation 'inline'"])
			assert.strictEqual(analysis.failed.size, 0)
		})

		it('should record payable and proof obligations', () => {
			const { analysis } = analyze('#[payable]\n#[proof("inv-1")]\nfn f() {}')
			const fn = analysis.functions.get('f')
			assert.ok(fn)
			assert.strictEqual(fn.annotations.payable, true)
			assert.deepStrictEqual(fn.annotations.proofs, ['inv-1'])
		})
	})
})
