import { readFileSync, statSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ExecutionDenied, FileActionFailure, InvalidPatch, SandboxViolation } from '../core/errors.js';
import type { CommandProposal, ReviewVerdict } from '../core/types.js';
import { canonicalRoot, resolvePathToken } from '../sandbox/containment.js';
import { withRootLock } from '../sandbox/executor.js';
import type { AuditEntry, AuditStore } from '../sandbox/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { utf8Prefix } from '../utils/text.js';
import { type PlannedChange, planPatch } from './patch.js';
import { type FileActionPlan, findFileActionViolation, planFileAction } from './review.js';
import type { FileAction, FileActionResult, FileChange } from './types.js';

export interface FileActionExecutorOptions {
	sandboxRoot: string;
	allowedExternalPaths: readonly string[];
	/** Bytes of a file that `read-file` returns. */
	maxReadBytes: number;
	audit?: AuditStore;
	sessionId?: string;
	logger?: Logger;
}

export interface FileActionExecutor {
	readonly sandboxRoot: string;
	apply(proposal: CommandProposal, verdict: ReviewVerdict, action: FileAction): Promise<FileActionResult>;
}

type ActionOutcome = Omit<FileActionResult, 'proposalId' | 'durationMs'>;

function toFileChange(change: PlannedChange): FileChange {
	return change.kind === 'moved'
		? { path: change.path, kind: 'moved', movedTo: change.movedTo }
		: { path: change.path, kind: change.kind };
}

/** `added notes.txt; moved a.txt -> b.txt` */
export function summarizeChanges(changes: readonly FileChange[]): string {
	return changes
		.map((change) => (change.movedTo ? `moved ${change.path} -> ${change.movedTo}` : `${change.kind} ${change.path}`))
		.join('; ');
}

/**
 * Creates the executor for file actions on one sandbox root. Like the
 * command executor it needs a matching approved verdict, re-checks
 * containment itself, and shares the per-root lock. A patch is planned in
 * full before the first write.
 */
export function createFileActionExecutor(options: FileActionExecutorOptions): FileActionExecutor {
	const sandboxRoot = canonicalRoot(options.sandboxRoot);
	const logger = (options.logger ?? createLogger('actions:executor')).child({ sandboxRoot });
	const sessionId = options.sessionId ?? '';

	function audit(entry: Omit<AuditEntry, 'id' | 'timestamp' | 'sessionId' | 'stage'>): void {
		options.audit?.log({ id: uuidv4(), timestamp: new Date(), sessionId, stage: 'execute', ...entry });
	}

	// `~` means the root, as it does for commands the executor spawns.
	function locate(raw: string): string {
		return resolvePathToken(raw, sandboxRoot, sandboxRoot).real;
	}

	function readExisting(raw: string): string | undefined {
		const target = locate(raw);
		return statSync(target, { throwIfNoEntry: false })?.isFile() ? readFileSync(target, 'utf-8') : undefined;
	}

	async function writeText(raw: string, content: string): Promise<number> {
		const target = locate(raw);
		await mkdir(path.dirname(target), { recursive: true });
		await writeFile(target, content, 'utf-8');
		return Buffer.byteLength(content, 'utf-8');
	}

	async function applyChange(change: PlannedChange): Promise<number> {
		switch (change.kind) {
			case 'deleted':
				await rm(locate(change.path));
				return 0;
			case 'added':
			case 'updated':
				return writeText(change.path, change.content);
			case 'moved': {
				const written = await writeText(change.movedTo, change.content);
				await rm(locate(change.path));
				return written;
			}
		}
	}

	async function perform(plan: FileActionPlan): Promise<ActionOutcome> {
		const { action } = plan;
		switch (action.action) {
			case 'read-file': {
				const target = locate(action.path);
				if (!statSync(target, { throwIfNoEntry: false })?.isFile()) {
					throw new FileActionFailure(`${action.path} is not a regular file`, { path: action.path });
				}
				const bytes = await readFile(target);
				return {
					action: action.action,
					changes: [],
					content: utf8Prefix(bytes, options.maxReadBytes),
					truncated: bytes.length > options.maxReadBytes,
					bytesWritten: 0,
				};
			}
			case 'write-file': {
				const existed = statSync(locate(action.path), { throwIfNoEntry: false }) !== undefined;
				const bytesWritten = await writeText(action.path, action.content);
				return {
					action: action.action,
					changes: [{ path: action.path, kind: existed ? 'updated' : 'added' }],
					truncated: false,
					bytesWritten,
				};
			}
			case 'apply-patch': {
				const planned = planPatch(plan.operations, readExisting);
				let bytesWritten = 0;
				for (const change of planned) {
					bytesWritten += await applyChange(change);
				}
				return { action: action.action, changes: planned.map(toFileChange), truncated: false, bytesWritten };
			}
		}
	}

	async function apply(proposal: CommandProposal, verdict: ReviewVerdict, action: FileAction): Promise<FileActionResult> {
		const command = redactSecrets(proposal.command);

		if (!verdict.approved || verdict.proposalId !== proposal.id) {
			const reason = verdict.approved
				? `Verdict belongs to proposal ${verdict.proposalId}, not ${proposal.id}`
				: `Proposal ${proposal.id} was not approved`;
			audit({ proposalId: proposal.id, command, decision: 'denied', result: 'denied', detail: reason, durationMs: 0 });
			throw new ExecutionDenied(reason, { proposalId: proposal.id, verdictProposalId: verdict.proposalId });
		}

		let plan: FileActionPlan;
		try {
			plan = planFileAction(action);
		} catch (err: unknown) {
			const message = err instanceof Error ? err.message : String(err);
			audit({ proposalId: proposal.id, command, decision: 'error', result: 'failure', detail: message, durationMs: 0 });
			throw err;
		}

		const violation = findFileActionViolation(plan, {
			sandboxRoot,
			homeDir: sandboxRoot,
			protectedPaths: [],
			allowedExternalPaths: options.allowedExternalPaths,
		});
		if (violation) {
			const error = new SandboxViolation(violation.resolved ?? violation.token, sandboxRoot, violation.reason);
			logger.error('Sandbox violation after approval: policy engine defect', {
				proposalId: proposal.id,
				action: command,
				reason: error.message,
			});
			audit({
				proposalId: proposal.id,
				command,
				decision: 'violation',
				result: 'denied',
				detail: error.message,
				durationMs: 0,
			});
			throw error;
		}

		return withRootLock(sandboxRoot, async () => {
			const startTime = Date.now();
			let outcome: ActionOutcome;
			try {
				outcome = await perform(plan);
			} catch (err: unknown) {
				const failure =
					err instanceof InvalidPatch || err instanceof FileActionFailure
						? err
						: new FileActionFailure(`${action.action} failed: ${err instanceof Error ? err.message : String(err)}`, {
								proposalId: proposal.id,
							});
				logger.warn('File action failed', { proposalId: proposal.id, action: command, error: failure.message });
				audit({
					proposalId: proposal.id,
					command,
					decision: 'approved',
					result: 'failure',
					detail: failure.message,
					durationMs: Date.now() - startTime,
				});
				throw failure;
			}

			const durationMs = Date.now() - startTime;
			const summary = summarizeChanges(outcome.changes);
			logger.info('File action applied', { proposalId: proposal.id, action: command, changes: summary, durationMs });
			audit({
				proposalId: proposal.id,
				command,
				decision: 'approved',
				result: 'success',
				detail: summary === '' ? undefined : summary,
				durationMs,
			});
			return Object.freeze({ proposalId: proposal.id, ...outcome, durationMs });
		});
	}

	return { sandboxRoot, apply };
}
