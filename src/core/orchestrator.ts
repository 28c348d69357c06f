import { v4 as uuidv4 } from 'uuid';
import type { GatedReviewer } from '../policy/gated-reviewer.js';
import type { SandboxedExecutor } from '../sandbox/executor.js';
import type { AuditEntry, AuditStore } from '../sandbox/types.js';
import type { Logger } from '../utils/logger.js';
import { DEFAULT_EXPECTATIONS, type Expectation } from '../verify/expectations.js';
import { verifyAll } from '../verify/verifier.js';
import {
	ExecutionFailure,
	ProposalFailure,
	SandboxViolation,
	ShellgateError,
	TaskCancelled,
	VerificationFailure,
} from './errors.js';
import { createProposal } from './model.js';
import type {
	CommandProposal,
	ExecutionResult,
	Proposer,
	ReviewVerdict,
	TaskRecord,
	TaskState,
} from './types.js';

type Draft = { -readonly [K in keyof TaskRecord]: TaskRecord[K] };

const ALLOWED_TRANSITIONS: Record<TaskState | 'new', readonly TaskState[]> = {
	new: ['proposed', 'failed'],
	proposed: ['reviewed', 'failed'],
	reviewed: ['rejected', 'executed', 'failed'],
	executed: ['verified', 'failed'],
	rejected: [],
	verified: [],
	failed: [],
};

/** Terminal states plus the review-only stopping point. */
export function isSettled(record: TaskRecord, reviewOnly = false): boolean {
	return ALLOWED_TRANSITIONS[record.state].length === 0 || (reviewOnly && record.state === 'reviewed');
}

function createTracker(task: string) {
	const draft: Draft = { task, state: 'proposed', history: [] };
	let current: TaskState | 'new' = 'new';

	return {
		move(next: TaskState, patch: Partial<Omit<Draft, 'task' | 'state' | 'history'>> = {}): void {
			if (!ALLOWED_TRANSITIONS[current].includes(next)) {
				throw new Error(`Illegal task transition ${current} -> ${next}`);
			}
			Object.assign(draft, patch);
			draft.state = next;
			draft.history = [...draft.history, next];
			current = next;
		},
		record(): TaskRecord {
			return Object.freeze({ ...draft, history: Object.freeze([...draft.history]) });
		},
	};
}

export interface OrchestratorDeps {
	session: { id: string; sandboxRoot: string; logger: Logger; audit: AuditStore };
	proposer: Proposer;
	reviewer: GatedReviewer;
	executor: SandboxedExecutor;
	/** Upper bound for `runWithRevisions`; the first attempt is not a revision. */
	maxRevisions?: number;
}

export interface TaskOptions {
	context?: string;
	/** Stop after review; nothing is executed. */
	reviewOnly?: boolean;
	expectations?: readonly Expectation[];
	signal?: AbortSignal;
	workingDir?: string;
	timeoutMs?: number;
}

export interface RevisionResult {
	final: TaskRecord;
	attempts: readonly TaskRecord[];
}

export interface Orchestrator {
	runTask(task: string, options?: TaskOptions): Promise<TaskRecord>;
	reviewCommand(command: string, rationale?: string, options?: Pick<TaskOptions, 'context'>): Promise<TaskRecord>;
	runWithRevisions(task: string, options?: TaskOptions): Promise<RevisionResult>;
}

const DEFAULT_MAX_REVISIONS = 2;

function describeAttempt(record: TaskRecord): string {
	const command = record.proposal ? `\`${record.proposal.command}\`` : 'The previous proposal';
	if (record.verdict && !record.verdict.approved) {
		return `${command} was rejected (${record.verdict.category}): ${record.verdict.reasoning}`;
	}
	if (record.failure instanceof VerificationFailure) {
		return `${command} ran but did not produce the expected state: ${record.failure.message}`;
	}
	if (record.failure instanceof ExecutionFailure) {
		const stderr = record.failure.stderr.trim().slice(0, 500);
		return `${command} failed: ${record.failure.message}${stderr ? `\nstderr: ${stderr}` : ''}`;
	}
	return `${command} failed: ${record.failure?.message ?? 'unknown reason'}`;
}

/** Revising cannot help after these. */
function isFinalFailure(failure: ShellgateError | undefined): boolean {
	return (
		failure instanceof SandboxViolation || failure instanceof TaskCancelled || failure instanceof ProposalFailure
	);
}

/**
 * Drives propose, review, execute and verify for one session, enforcing the
 * task state machine. Errors that belong to a task end up on its record;
 * only defects in the orchestrator itself are thrown.
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
	const { session } = deps;
	const logger = session.logger.child({ module: 'core:orchestrator' });
	const maxRevisions = deps.maxRevisions ?? DEFAULT_MAX_REVISIONS;

	function audit(entry: Omit<AuditEntry, 'id' | 'timestamp' | 'sessionId'>): void {
		session.audit.log({ id: uuidv4(), timestamp: new Date(), sessionId: session.id, ...entry });
	}

	function auditReview(proposal: CommandProposal, verdict: ReviewVerdict, durationMs: number): void {
		audit({
			proposalId: proposal.id,
			stage: 'review',
			command: proposal.command,
			decision: verdict.approved ? 'approved' : 'rejected',
			result: verdict.approved ? 'success' : 'denied',
			detail: verdict.approved ? verdict.reasoning : `${verdict.classifier}: ${verdict.reasoning}`,
			durationMs,
		});
	}

	async function review(
		tracker: ReturnType<typeof createTracker>,
		proposal: CommandProposal,
		context: string,
	): Promise<ReviewVerdict> {
		const started = Date.now();
		const verdict = await deps.reviewer.review(proposal, session.sandboxRoot, context);
		auditReview(proposal, verdict, Date.now() - started);
		tracker.move('reviewed', { verdict });
		if (!verdict.approved) {
			logger.info('Task rejected', {
				proposalId: proposal.id,
				category: verdict.category,
				reason: verdict.reasoning,
			});
			tracker.move('rejected');
		}
		return verdict;
	}

	async function runTask(task: string, options: TaskOptions = {}): Promise<TaskRecord> {
		const tracker = createTracker(task);
		const context = options.context ?? '';

		if (options.signal?.aborted) {
			tracker.move('failed', { failure: new TaskCancelled('before proposal') });
			return tracker.record();
		}

		let proposal: CommandProposal;
		try {
			proposal = await deps.proposer.propose(task, context);
		} catch (err: unknown) {
			const failure =
				err instanceof ProposalFailure
					? err
					: new ProposalFailure(err instanceof Error ? err.message : String(err));
			logger.warn('Proposal failed', { task, reason: failure.message });
			tracker.move('failed', { failure });
			return tracker.record();
		}
		tracker.move('proposed', { proposal });

		if (options.signal?.aborted) {
			tracker.move('failed', { failure: new TaskCancelled('before review') });
			return tracker.record();
		}

		const verdict = await review(tracker, proposal, context);
		if (!verdict.approved || options.reviewOnly) {
			return tracker.record();
		}

		if (options.signal?.aborted) {
			tracker.move('failed', { failure: new TaskCancelled('before execution') });
			return tracker.record();
		}

		let execution: ExecutionResult;
		try {
			execution = await deps.executor.run(proposal, verdict, {
				workingDir: options.workingDir,
				timeoutMs: options.timeoutMs,
			});
		} catch (err: unknown) {
			if (err instanceof ShellgateError) {
				tracker.move('failed', { failure: err });
				return tracker.record();
			}
			throw err;
		}

		if (execution.timedOut) {
			tracker.move('failed', { execution, failure: new ExecutionFailure(execution) });
			return tracker.record();
		}
		tracker.move('executed', { execution });

		// Execution is atomic: a cancel that arrived meanwhile applies now, before verification.
		if (options.signal?.aborted) {
			tracker.move('failed', { failure: new TaskCancelled('after execution') });
			return tracker.record();
		}

		const expectations = options.expectations?.length ? options.expectations : DEFAULT_EXPECTATIONS;
		const started = Date.now();
		const report = verifyAll(execution, expectations, session.sandboxRoot);
		const failed = report.outcomes.filter((entry) => !entry.passed);
		audit({
			proposalId: proposal.id,
			stage: 'verify',
			command: proposal.command,
			decision: 'approved',
			result: report.passed ? 'success' : 'failure',
			detail: failed.map((entry) => entry.detail).join('; ') || undefined,
			durationMs: Date.now() - started,
		});

		if (report.passed) {
			if (execution.exitCode !== 0) {
				logger.warn('Command exited non-zero but the expected state holds', {
					proposalId: proposal.id,
					exitCode: execution.exitCode,
				});
			}
			tracker.move('verified', { verifications: report.outcomes });
			return tracker.record();
		}

		const failure =
			execution.exitCode !== 0
				? new ExecutionFailure(execution)
				: new VerificationFailure(failed.map(({ expectation, detail }) => ({ expectation, detail })));
		logger.info('Task failed verification', { proposalId: proposal.id, reason: failure.message });
		tracker.move('failed', { verifications: report.outcomes, failure });
		return tracker.record();
	}

	async function reviewCommand(
		command: string,
		rationale = '',
		options: Pick<TaskOptions, 'context'> = {},
	): Promise<TaskRecord> {
		const tracker = createTracker(command);
		const proposal = createProposal(command, rationale);
		tracker.move('proposed', { proposal });
		await review(tracker, proposal, options.context ?? '');
		return tracker.record();
	}

	async function runWithRevisions(task: string, options: TaskOptions = {}): Promise<RevisionResult> {
		const attempts: TaskRecord[] = [];
		let context = options.context ?? '';

		for (let attempt = 0; attempt <= maxRevisions; attempt++) {
			const record = await runTask(task, { ...options, context });
			attempts.push(record);

			const succeeded = record.state === 'verified' || (options.reviewOnly === true && record.state === 'reviewed');
			if (succeeded || isFinalFailure(record.failure)) break;

			if (attempt < maxRevisions) {
				logger.info('Revising proposal', { task, attempt: attempt + 1, maxRevisions });
				context = [context, `Previous attempt ${attempt + 1}: ${describeAttempt(record)}`]
					.filter((part) => part.trim() !== '')
					.join('\n\n');
			}
		}

		const final = attempts.at(-1);
		if (!final) {
			throw new Error('runWithRevisions made no attempt');
		}
		return { final, attempts };
	}

	return { runTask, reviewCommand, runWithRevisions };
}
