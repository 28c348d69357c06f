import { spawn } from 'node:child_process';
import { statSync } from 'node:fs';
import { constants as osConstants } from 'node:os';
import { v4 as uuidv4 } from 'uuid';
import type { Platform } from '../config/schema.js';
import { ExecutionDenied, ExecutionFailure, SandboxViolation } from '../core/errors.js';
import type { CommandProposal, ExecutionResult, ReviewVerdict } from '../core/types.js';
import { findContainmentViolation } from '../policy/classifiers/path-containment.js';
import { parseCommand } from '../policy/shell-tokens.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { utf8Prefix } from '../utils/text.js';
import { canonicalRoot, isWithin, resolvePathToken } from './containment.js';
import type { AuditEntry, AuditStore, RunOptions } from './types.js';

/** Exit code reported for a command killed on timeout, as coreutils `timeout` does. */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit code reported when the shell itself cannot be started. */
const SPAWN_FAILURE_EXIT_CODE = 127;

export interface ExecutorOptions {
	sandboxRoot: string;
	platform: Platform;
	allowedExternalPaths: readonly string[];
	maxOutputBytes: number;
	defaultTimeoutMs: number;
	killGraceMs: number;
	audit?: AuditStore;
	sessionId?: string;
	logger?: Logger;
}

export interface SandboxedExecutor {
	readonly sandboxRoot: string;
	run(proposal: CommandProposal, verdict: ReviewVerdict, options?: RunOptions): Promise<ExecutionResult>;
}

interface OutputBuffer {
	push(chunk: Buffer): void;
	readonly truncated: boolean;
	text(): string;
}

function createOutputBuffer(limit: number): OutputBuffer {
	const chunks: Buffer[] = [];
	let size = 0;
	let truncated = false;

	return {
		push(chunk: Buffer): void {
			const room = limit - size;
			if (chunk.length > room) truncated = true;
			if (room <= 0) return;
			const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
			chunks.push(kept);
			size += kept.length;
		},
		get truncated() {
			return truncated;
		},
		text(): string {
			const decoded = utf8Prefix(Buffer.concat(chunks), limit);
			return truncated ? `${decoded}\n[output truncated at ${limit} bytes]` : decoded;
		},
	};
}

function signalNumber(signal: NodeJS.Signals): number {
	const entry = Object.entries(osConstants.signals).find(([name]) => name === signal);
	return entry ? entry[1] : 0;
}

// One command or file action at a time per sandbox root, across every executor in the process.
const rootLocks = new Map<string, Promise<void>>();

/** Runs `task` once every earlier task on the same root has settled. */
export function withRootLock<T>(root: string, task: () => Promise<T>): Promise<T> {
	const previous = rootLocks.get(root) ?? Promise.resolve();
	const run = previous.then(task);
	const settled = run.then(
		() => undefined,
		() => undefined,
	);
	rootLocks.set(root, settled);
	return run.finally(() => {
		if (rootLocks.get(root) === settled) rootLocks.delete(root);
	});
}

interface ProcessOutcome {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	truncated: boolean;
}

/**
 * Creates the executor for one sandbox root. It runs only commands carrying
 * a matching approved verdict, re-checks containment itself, and spawns
 * each command in its own process group so a timeout can kill the whole tree.
 */
export function createSandboxedExecutor(options: ExecutorOptions): SandboxedExecutor {
	const sandboxRoot = canonicalRoot(options.sandboxRoot);
	const logger = (options.logger ?? createLogger('sandbox:executor')).child({ sandboxRoot });
	const sessionId = options.sessionId ?? '';

	function audit(entry: Omit<AuditEntry, 'id' | 'timestamp' | 'sessionId' | 'stage'>): void {
		options.audit?.log({ id: uuidv4(), timestamp: new Date(), sessionId, stage: 'execute', ...entry });
	}

	function killGroup(pid: number, signal: NodeJS.Signals): void {
		try {
			process.kill(-pid, signal);
		} catch (err: unknown) {
			// ESRCH: the group is already gone.
			if (!(err instanceof Error && 'code' in err && err.code === 'ESRCH')) {
				logger.warn('Failed to signal process group', {
					pid,
					signal,
					error: err instanceof Error ? err.message : String(err),
				});
			}
		}
	}

	function spawnBounded(command: string, cwd: string, timeoutMs: number): Promise<ProcessOutcome> {
		return new Promise((resolve, reject) => {
			const child = spawn('/bin/sh', ['-c', command], {
				cwd,
				detached: true,
				stdio: ['ignore', 'pipe', 'pipe'],
				env: {
					PATH: process.env.PATH ?? '/usr/local/bin:/usr/bin:/bin',
					HOME: sandboxRoot,
					LANG: process.env.LANG ?? 'C.UTF-8',
				},
			});
			const stdout = createOutputBuffer(options.maxOutputBytes);
			const stderr = createOutputBuffer(options.maxOutputBytes);
			let timedOut = false;
			let exitCode: number | null = null;
			let exitSignal: NodeJS.Signals | null = null;
			let graceTimer: NodeJS.Timeout | undefined;

			child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
			child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

			const timer = setTimeout(() => {
				const pid = child.pid;
				if (pid === undefined) return;
				timedOut = true;
				logger.warn('Command timed out, terminating process group', { pid, timeoutMs });
				killGroup(pid, 'SIGTERM');
				graceTimer = setTimeout(() => killGroup(pid, 'SIGKILL'), options.killGraceMs);
			}, timeoutMs);

			const clearTimers = () => {
				clearTimeout(timer);
				if (graceTimer) clearTimeout(graceTimer);
			};

			child.on('error', (err) => {
				clearTimers();
				reject(err);
			});

			child.on('exit', (code, signal) => {
				exitCode = code;
				exitSignal = signal;
				// Background jobs the shell left behind do not outlive it.
				if (child.pid !== undefined) killGroup(child.pid, 'SIGKILL');
			});

			child.on('close', () => {
				clearTimers();
				const code = timedOut
					? TIMEOUT_EXIT_CODE
					: (exitCode ?? (exitSignal ? 128 + signalNumber(exitSignal) : 1));
				resolve({
					exitCode: code,
					stdout: stdout.text(),
					stderr: stderr.text(),
					timedOut,
					truncated: stdout.truncated || stderr.truncated,
				});
			});
		});
	}

	function resolveWorkingDir(requested: string | undefined, proposal: CommandProposal): string {
		if (requested === undefined) return sandboxRoot;
		const resolved = resolvePathToken(requested, sandboxRoot).real;
		if (!isWithin(sandboxRoot, resolved)) {
			throw new SandboxViolation(resolved, sandboxRoot, 'working directory');
		}
		const stats = statSync(resolved, { throwIfNoEntry: false });
		if (!stats?.isDirectory()) {
			throw new ExecutionFailure({
				exitCode: SPAWN_FAILURE_EXIT_CODE,
				timedOut: false,
				stdout: '',
				stderr: `Working directory ${resolved} does not exist for proposal ${proposal.id}`,
			});
		}
		return resolved;
	}

	function assertContained(proposal: CommandProposal, workingDir: string): void {
		// The child runs with HOME set to the root, so `~` means the root here.
		const violation = findContainmentViolation({
			parsed: parseCommand(proposal.command),
			sandboxRoot,
			workingDir,
			homeDir: sandboxRoot,
			platform: options.platform,
			protectedPaths: [],
			allowedExternalPaths: options.allowedExternalPaths,
		});
		if (!violation) return;
		throw new SandboxViolation(violation.resolved ?? violation.token, sandboxRoot, violation.reason);
	}

	async function run(
		proposal: CommandProposal,
		verdict: ReviewVerdict,
		runOptions: RunOptions = {},
	): Promise<ExecutionResult> {
		const redactedCommand = redactSecrets(proposal.command);

		if (!verdict.approved || verdict.proposalId !== proposal.id) {
			const reason = verdict.approved
				? `Verdict belongs to proposal ${verdict.proposalId}, not ${proposal.id}`
				: `Proposal ${proposal.id} was not approved`;
			audit({
				proposalId: proposal.id,
				command: redactedCommand,
				decision: 'denied',
				result: 'denied',
				detail: reason,
				durationMs: 0,
			});
			throw new ExecutionDenied(reason, { proposalId: proposal.id, verdictProposalId: verdict.proposalId });
		}

		let workingDir: string;
		try {
			workingDir = resolveWorkingDir(runOptions.workingDir, proposal);
			assertContained(proposal, workingDir);
		} catch (err: unknown) {
			if (err instanceof SandboxViolation) {
				logger.error('Sandbox violation after approval: policy engine defect', {
					proposalId: proposal.id,
					command: redactedCommand,
					path: err.path,
					reason: err.message,
				});
				audit({
					proposalId: proposal.id,
					command: redactedCommand,
					decision: 'violation',
					result: 'denied',
					detail: err.message,
					durationMs: 0,
				});
			}
			throw err;
		}

		const timeoutMs = runOptions.timeoutMs ?? options.defaultTimeoutMs;

		return withRootLock(sandboxRoot, async () => {
			const startTime = Date.now();
			let outcome: ProcessOutcome;
			try {
				outcome = await spawnBounded(proposal.command, workingDir, timeoutMs);
			} catch (err: unknown) {
				const message = err instanceof Error ? err.message : String(err);
				const durationMs = Date.now() - startTime;
				logger.error('Failed to start command', { proposalId: proposal.id, error: message });
				audit({
					proposalId: proposal.id,
					command: redactedCommand,
					decision: 'error',
					result: 'failure',
					detail: message,
					durationMs,
				});
				throw new ExecutionFailure({
					exitCode: SPAWN_FAILURE_EXIT_CODE,
					timedOut: false,
					stdout: '',
					stderr: message,
				});
			}

			const durationMs = Date.now() - startTime;
			logger.info('Command executed', {
				proposalId: proposal.id,
				command: redactedCommand,
				exitCode: outcome.exitCode,
				timedOut: outcome.timedOut,
				durationMs,
			});
			audit({
				proposalId: proposal.id,
				command: redactedCommand,
				decision: 'approved',
				result: outcome.timedOut ? 'timeout' : outcome.exitCode === 0 ? 'success' : 'failure',
				output: outcome.stdout || outcome.stderr,
				durationMs,
			});

			return Object.freeze({
				proposalId: proposal.id,
				exitCode: outcome.exitCode,
				stdout: outcome.stdout,
				stderr: outcome.stderr,
				durationMs,
				timedOut: outcome.timedOut,
				truncated: outcome.truncated,
			});
		});
	}

	return { sandboxRoot, run };
}
