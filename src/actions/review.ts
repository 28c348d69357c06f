import type { ContainmentViolation } from '../policy/classifiers/path-containment.js';
import { expandPatterns, matchesAny } from '../policy/paths.js';
import { isWithin, resolvePathToken } from '../sandbox/containment.js';
import { type PatchOperation, parsePatch, patchPaths } from './patch.js';
import type { FileAction } from './types.js';

/** What a file action touches, worked out before it is reviewed or run. */
export interface FileActionPlan {
	readonly action: FileAction;
	/** One-line summary; stands in for the command text in proposals and the audit log. */
	readonly description: string;
	readonly reads: readonly string[];
	readonly writes: readonly string[];
	/** Parsed operations of an `apply-patch` action; empty otherwise. */
	readonly operations: readonly PatchOperation[];
}

/** `sandboxRoot` must already be canonical. */
export interface FileActionContext {
	sandboxRoot: string;
	homeDir: string;
	protectedPaths: readonly string[];
	allowedExternalPaths: readonly string[];
}

function describeOperation(operation: PatchOperation): string {
	if (operation.type === 'update' && operation.moveTo !== null) {
		return `update ${operation.path} -> ${operation.moveTo}`;
	}
	return `${operation.type} ${operation.path}`;
}

/** Throws `InvalidPatch` when an `apply-patch` action does not parse. */
export function planFileAction(action: FileAction): FileActionPlan {
	switch (action.action) {
		case 'read-file':
			return { action, description: `read-file ${action.path}`, reads: [action.path], writes: [], operations: [] };
		case 'write-file':
			return {
				action,
				description: `write-file ${action.path} (${Buffer.byteLength(action.content, 'utf-8')} bytes)`,
				reads: [],
				writes: [action.path],
				operations: [],
			};
		case 'apply-patch': {
			const operations = parsePatch(action.patch);
			const { reads, writes } = patchPaths(operations);
			return {
				action,
				description: `apply-patch ${operations.map(describeOperation).join(', ')}`,
				reads,
				writes,
				operations,
			};
		}
	}
}

/**
 * Every path a file action names must resolve inside the sandbox root, or
 * match `allowedExternalPaths`. Shared by the policy engine and the file
 * action executor's own check.
 */
export function findFileActionViolation(plan: FileActionPlan, context: FileActionContext): ContainmentViolation | null {
	const allowed = expandPatterns(context.allowedExternalPaths, context.homeDir);

	for (const raw of [...plan.reads, ...plan.writes]) {
		if (raw.includes('\0')) {
			return { token: raw, resolved: null, reason: `Path ${JSON.stringify(raw)} contains a NUL byte` };
		}
		const resolved = resolvePathToken(raw, context.sandboxRoot, context.homeDir);
		if (isWithin(context.sandboxRoot, resolved.real)) continue;
		if (matchesAny([resolved.lexical, resolved.real], allowed)) continue;
		return {
			token: raw,
			resolved: resolved.real,
			reason: `Path "${raw}" resolves to ${resolved.real}, outside the sandbox root`,
		};
	}
	return null;
}

/** Reason a write would land on a protected path, or `null`. */
export function findProtectedWrite(plan: FileActionPlan, context: FileActionContext): string | null {
	const protectedPatterns = expandPatterns(context.protectedPaths, context.homeDir);

	for (const raw of plan.writes) {
		const resolved = resolvePathToken(raw, context.sandboxRoot, context.homeDir);
		if (isWithin(context.sandboxRoot, resolved.real)) continue;
		if (matchesAny([resolved.lexical, resolved.real], protectedPatterns)) {
			return `${plan.action.action} would modify protected system file ${resolved.lexical}`;
		}
	}
	return null;
}
