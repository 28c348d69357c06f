import type { Expectation } from '../verify/expectations.js';

export type ShellgateErrorKind =
	| 'proposal-failure'
	| 'execution-failure'
	| 'execution-denied'
	| 'sandbox-violation'
	| 'verification-failure'
	| 'invalid-patch'
	| 'file-action-failure'
	| 'cancelled';

/**
 * Base class for every failure the pipeline surfaces to its caller.
 * A rejected review is not an error: it is a verdict.
 */
export abstract class ShellgateError extends Error {
	abstract readonly kind: ShellgateErrorKind;
	readonly context?: Record<string, unknown>;

	constructor(message: string, context?: Record<string, unknown>) {
		super(message);
		this.name = new.target.name;
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			kind: this.kind,
			message: this.message,
			context: this.context,
		};
	}
}

/** The proposer was unreachable, timed out, or returned nothing reviewable. */
export class ProposalFailure extends ShellgateError {
	readonly kind = 'proposal-failure';

	static empty(): ProposalFailure {
		return new ProposalFailure('Proposer returned an empty command');
	}

	static timeout(ms: number): ProposalFailure {
		return new ProposalFailure(`Proposer did not answer within ${ms}ms`, { timeoutMs: ms });
	}
}

/** The command ran but exited non-zero or was killed on timeout. */
export class ExecutionFailure extends ShellgateError {
	readonly kind = 'execution-failure';
	readonly exitCode: number;
	readonly timedOut: boolean;
	readonly stdout: string;
	readonly stderr: string;

	constructor(result: { exitCode: number; timedOut: boolean; stdout: string; stderr: string }) {
		super(
			result.timedOut
				? 'Command timed out and was terminated'
				: `Command exited with code ${result.exitCode}`,
			{ exitCode: result.exitCode, timedOut: result.timedOut },
		);
		this.exitCode = result.exitCode;
		this.timedOut = result.timedOut;
		this.stdout = result.stdout;
		this.stderr = result.stderr;
	}
}

/** The executor refused to run a proposal that lacks a matching approved verdict. */
export class ExecutionDenied extends ShellgateError {
	readonly kind = 'execution-denied';
}

/**
 * An approved command would touch a path outside the sandbox root.
 * Always a defect in the policy engine's containment classifier.
 */
export class SandboxViolation extends ShellgateError {
	readonly kind = 'sandbox-violation';
	readonly path: string;

	constructor(path: string, sandboxRoot: string, detail?: string) {
		super(`Path ${path} resolves outside sandbox root ${sandboxRoot}${detail ? `: ${detail}` : ''}`, {
			path,
			sandboxRoot,
		});
		this.path = path;
	}
}

/** The executed command did not produce the expected state. */
export class VerificationFailure extends ShellgateError {
	readonly kind = 'verification-failure';
	readonly failed: readonly { expectation: Expectation; detail: string }[];

	constructor(failed: readonly { expectation: Expectation; detail: string }[]) {
		super(
			`Verification failed: ${failed.map((entry) => `${entry.expectation.type} (${entry.detail})`).join('; ')}`,
		);
		this.failed = failed;
	}
}

/** Patch text that does not parse, or whose context does not match the files. */
export class InvalidPatch extends ShellgateError {
	readonly kind = 'invalid-patch';
}

/** A read, write or patch failed on the filesystem after approval. */
export class FileActionFailure extends ShellgateError {
	readonly kind = 'file-action-failure';
}

/** The caller aborted the task before it reached a terminal state. */
export class TaskCancelled extends ShellgateError {
	readonly kind = 'cancelled';

	constructor(stage: string) {
		super(`Task cancelled ${stage}`, { stage });
	}
}
