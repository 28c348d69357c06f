import type { ShellgateError } from './errors.js';
import type { Expectation } from '../verify/expectations.js';

/** Result type for fallible operations */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/** A candidate shell command plus the proposer's rationale, not yet vetted. */
export interface CommandProposal {
	readonly id: string;
	readonly command: string;
	readonly rationale: string;
}

/**
 * Why a proposal was rejected. `portability` is kept apart from the safety
 * categories so callers can tell "wrong flags for this platform" from
 * "dangerous".
 */
export type RejectionCategory =
	| 'destructive'
	| 'containment'
	| 'portability'
	| 'syntax'
	| 'system-file'
	| 'reviewer'
	| 'malformed';

export type ReviewVerdict =
	| {
			readonly proposalId: string;
			readonly approved: true;
			readonly reasoning?: string;
	  }
	| {
			readonly proposalId: string;
			readonly approved: false;
			readonly reasoning: string;
			readonly category: RejectionCategory;
			/** Name of the classifier (or reviewer) that rejected. */
			readonly classifier: string;
	  };

export interface ExecutionResult {
	readonly proposalId: string;
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
	readonly durationMs: number;
	readonly timedOut: boolean;
	/** Set when stdout or stderr hit the capture budget. */
	readonly truncated: boolean;
}

export interface VerificationOutcome {
	readonly passed: boolean;
	readonly detail: string;
	readonly expectation: Expectation;
}

export type TaskState = 'proposed' | 'reviewed' | 'rejected' | 'executed' | 'verified' | 'failed';

/** Everything the orchestrator learned about one task, in pipeline order. */
export interface TaskRecord {
	readonly task: string;
	readonly state: TaskState;
	readonly history: readonly TaskState[];
	readonly proposal?: CommandProposal;
	readonly verdict?: ReviewVerdict;
	readonly execution?: ExecutionResult;
	readonly verifications?: readonly VerificationOutcome[];
	readonly failure?: ShellgateError;
}

/** Produces candidate commands for a task. Backed by an LLM or a fixed script. */
export interface Proposer {
	propose(task: string, context: string): Promise<CommandProposal>;
}

/** Optional generative second opinion on a proposal. */
export interface Reviewer {
	assess(proposal: CommandProposal, context: string): Promise<ReviewVerdict>;
}
