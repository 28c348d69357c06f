export { createAuditStore, createInMemoryAuditStore } from './audit.js';
export {
	canonicalRoot,
	expandHomeToken,
	isWithin,
	resolveInsideRoot,
	resolvePathToken,
	type ResolvedPath,
} from './containment.js';
export {
	createSandboxedExecutor,
	type ExecutorOptions,
	type SandboxedExecutor,
	TIMEOUT_EXIT_CODE,
} from './executor.js';
export type {
	AuditDecision,
	AuditEntry,
	AuditFilters,
	AuditResult,
	AuditStage,
	AuditStore,
	RunOptions,
} from './types.js';
