import { existsSync, mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createScriptedProposer } from '../../agents/scripted.js';
import { createPolicyEngine } from '../../policy/engine.js';
import { createGatedReviewer } from '../../policy/gated-reviewer.js';
import { createSandboxedExecutor, type SandboxedExecutor } from '../../sandbox/executor.js';
import { ExecutionFailure, ProposalFailure, SandboxViolation, TaskCancelled, VerificationFailure } from '../errors.js';
import { createProposal } from '../model.js';
import { createOrchestrator, isSettled } from '../orchestrator.js';
import { createSession, type Session } from '../session.js';
import type { Proposer } from '../types.js';

let base: string;
let session: Session;

beforeEach(async () => {
	base = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-orchestrator-')));
	session = await createSession({ baseDir: base });
});

afterEach(async () => {
	await session.close();
	rmSync(base, { recursive: true, force: true });
});

const engine = createPolicyEngine({
	platform: 'gnu',
	protectedPaths: ['/etc/**'],
	allowedExternalPaths: ['/dev/null'],
});

function executorFor(current: Session): SandboxedExecutor {
	return createSandboxedExecutor({
		sandboxRoot: current.sandboxRoot,
		platform: 'gnu',
		allowedExternalPaths: ['/dev/null'],
		maxOutputBytes: 64 * 1024,
		defaultTimeoutMs: 5_000,
		killGraceMs: 100,
		audit: current.audit,
		sessionId: current.id,
	});
}

function orchestrator(proposer: Proposer, overrides: { executor?: SandboxedExecutor; maxRevisions?: number } = {}) {
	return createOrchestrator({
		session,
		proposer,
		reviewer: createGatedReviewer({ engine }),
		executor: overrides.executor ?? executorFor(session),
		maxRevisions: overrides.maxRevisions,
	});
}

function scripted(entries: Record<string, string>): Proposer {
	return createScriptedProposer(new Map(Object.entries(entries)));
}

describe('runTask', () => {
	it('walks a safe command through to verified', async () => {
		const record = await orchestrator(scripted({ 'Create an archive directory': 'mkdir archive' })).runTask(
			'Create an archive directory',
			{ expectations: [{ type: 'directory-exists', path: 'archive' }] },
		);

		expect(record.state).toBe('verified');
		expect(record.history).toEqual(['proposed', 'reviewed', 'executed', 'verified']);
		expect(record.execution?.exitCode).toBe(0);
		expect(record.verifications?.map((outcome) => outcome.detail)).toEqual(['archive is a directory']);
		expect(existsSync(join(session.sandboxRoot, 'archive'))).toBe(true);
		expect(Object.isFrozen(record)).toBe(true);

		const stages = session.audit.query({ sessionId: session.id }).map((entry) => entry.stage);
		expect(stages.sort()).toEqual(['execute', 'review', 'verify']);
	});

	it('stops at rejected and never executes', async () => {
		const record = await orchestrator(scripted({ 'Wipe it': 'rm -rf /' })).runTask('Wipe it');

		expect(record.state).toBe('rejected');
		expect(record.history).toEqual(['proposed', 'reviewed', 'rejected']);
		expect(record.verdict).toMatchObject({ approved: false, category: 'destructive' });
		expect(record.execution).toBeUndefined();
		expect(session.audit.query({ stage: 'execute' })).toHaveLength(0);
	});

	it('stops after review in review-only mode', async () => {
		const record = await orchestrator(scripted({ 'Make a file': 'touch a.txt' })).runTask('Make a file', {
			reviewOnly: true,
		});

		expect(record.state).toBe('reviewed');
		expect(record.verdict?.approved).toBe(true);
		expect(existsSync(join(session.sandboxRoot, 'a.txt'))).toBe(false);
		expect(isSettled(record, true)).toBe(true);
		expect(isSettled(record)).toBe(false);
	});

	it('fails verification when the expected state is missing', async () => {
		const record = await orchestrator(scripted({ 'Make a file': 'touch a.txt' })).runTask('Make a file', {
			expectations: [{ type: 'file-exists', path: 'b.txt' }],
		});

		expect(record.state).toBe('failed');
		expect(record.history).toEqual(['proposed', 'reviewed', 'executed', 'failed']);
		expect(record.failure).toBeInstanceOf(VerificationFailure);
		expect(record.failure?.message).toBe('Verification failed: file-exists (b.txt is not a regular file)');
	});

	it('reports a non-zero exit as an execution failure', async () => {
		const record = await orchestrator(scripted({ 'Do nothing badly': 'false' })).runTask('Do nothing badly');

		expect(record.state).toBe('failed');
		expect(record.failure).toBeInstanceOf(ExecutionFailure);
		expect(record.failure?.message).toBe('Command exited with code 1');
	});

	it('fails a timed-out command without entering executed', async () => {
		const record = await orchestrator(scripted({ 'Wait': 'sleep 5' })).runTask('Wait', { timeoutMs: 100 });

		expect(record.history).toEqual(['proposed', 'reviewed', 'failed']);
		expect(record.execution?.timedOut).toBe(true);
		expect(record.failure?.message).toBe('Command timed out and was terminated');
	});

	it('records a proposer failure', async () => {
		const record = await orchestrator(scripted({})).runTask('Unknown task');

		expect(record.state).toBe('failed');
		expect(record.history).toEqual(['failed']);
		expect(record.failure).toBeInstanceOf(ProposalFailure);
		expect(record.proposal).toBeUndefined();
	});

	it('wraps a plain proposer error', async () => {
		const proposer: Proposer = {
			propose: async () => {
				throw new Error('socket hang up');
			},
		};
		const record = await orchestrator(proposer).runTask('anything');
		expect(record.failure).toBeInstanceOf(ProposalFailure);
		expect(record.failure?.message).toBe('socket hang up');
	});

	it('honors an abort before the proposal', async () => {
		const controller = new AbortController();
		controller.abort();
		const propose = vi.fn<Proposer['propose']>();

		const record = await orchestrator({ propose }).runTask('anything', { signal: controller.signal });

		expect(record.failure).toBeInstanceOf(TaskCancelled);
		expect(record.failure?.message).toBe('Task cancelled before proposal');
		expect(propose).not.toHaveBeenCalled();
	});

	it('records a sandbox violation raised by the executor', async () => {
		const executor: SandboxedExecutor = {
			sandboxRoot: session.sandboxRoot,
			run: vi.fn<SandboxedExecutor['run']>().mockRejectedValue(new SandboxViolation('/outside', session.sandboxRoot)),
		};
		const record = await orchestrator(scripted({ 'List': 'ls' }), { executor }).runTask('List');

		expect(record.state).toBe('failed');
		expect(record.failure).toBeInstanceOf(SandboxViolation);
	});

	it('rethrows errors that are not task failures', async () => {
		const executor: SandboxedExecutor = {
			sandboxRoot: session.sandboxRoot,
			run: vi.fn<SandboxedExecutor['run']>().mockRejectedValue(new TypeError('bug')),
		};
		await expect(orchestrator(scripted({ 'List': 'ls' }), { executor }).runTask('List')).rejects.toThrow('bug');
	});
});

describe('reviewCommand', () => {
	it('reviews a fixed command without proposing or executing', async () => {
		const propose = vi.fn<Proposer['propose']>();
		const record = await orchestrator({ propose }).reviewCommand('cat ../../etc/passwd', 'traversal');

		expect(record.state).toBe('rejected');
		expect(record.proposal).toMatchObject({ command: 'cat ../../etc/passwd', rationale: 'traversal' });
		expect(record.verdict).toMatchObject({ approved: false, category: 'containment' });
		expect(propose).not.toHaveBeenCalled();
	});
});

describe('runWithRevisions', () => {
	it('feeds the rejection back to the proposer and retries', async () => {
		const propose = vi.fn<Proposer['propose']>(async (_task, context) =>
			createProposal(context.includes('Previous attempt 1') ? 'mkdir archive' : 'rm -rf /'),
		);

		const result = await orchestrator({ propose }).runWithRevisions('Create an archive directory', {
			expectations: [{ type: 'directory-exists', path: 'archive' }],
		});

		expect(result.attempts.map((attempt) => attempt.state)).toEqual(['rejected', 'verified']);
		expect(result.final.state).toBe('verified');
		expect(propose.mock.calls[0]?.[1]).toBe('');
		expect(propose.mock.calls[1]?.[1]).toMatch(/^Previous attempt 1: `rm -rf \/` was rejected \(destructive\): /);
	});

	it('gives up after the revision budget', async () => {
		const result = await orchestrator(scripted({ 'Fail': 'false' }), { maxRevisions: 1 }).runWithRevisions('Fail');

		expect(result.attempts).toHaveLength(2);
		expect(result.final.failure).toBeInstanceOf(ExecutionFailure);
	});

	it('does not retry after a proposer failure', async () => {
		const result = await orchestrator(scripted({})).runWithRevisions('Unknown task');
		expect(result.attempts).toHaveLength(1);
	});

	it('stops at reviewed in review-only mode', async () => {
		const result = await orchestrator(scripted({ 'List': 'ls' })).runWithRevisions('List', { reviewOnly: true });
		expect(result.attempts).toHaveLength(1);
		expect(result.final.state).toBe('reviewed');
	});
});
