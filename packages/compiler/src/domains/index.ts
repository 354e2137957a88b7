export { type FunctionAnnotations, interpretAnnotations, parseAnnotation, parseDomainRef } from './annotations.ts'
export {
	analyzeDomains,
	DEFAULT_DOMAIN_OPTIONS,
	type DomainAnalysis,
	type DomainOptions,
	type DynamicKeyPolicy,
	type FunctionDomains,
} from './analyzer.ts'
export {
	buildCallGraph,
	type CallGraph,
	functionCallees,
	isRecursive,
	moduleCallGraph,
	stronglyConnectedComponents,
	transitiveCallers,
} from './callgraph.ts'
export {
	canonicalDomain,
	conflicts,
	type DomainEntry,
	type DomainKey,
	type DomainSet,
	EMPTY_DOMAIN_SET,
	formatDomain,
	keyedDomain,
	scalarDomain,
	toEntry,
	unionSets,
	wildcardDomain,
} from './domain.ts'
export { DomainKeyTable, hashDomainKey, namespaceDigest, namespaceKey, sha256 } from './hash.ts'
export { formatKey, KeyResolver } from './keys.ts'
