export {
	ExecutionDenied,
	ExecutionFailure,
	FileActionFailure,
	InvalidPatch,
	ProposalFailure,
	SandboxViolation,
	ShellgateError,
	type ShellgateErrorKind,
	TaskCancelled,
	VerificationFailure,
} from './errors.js';
export { approveVerdict, createProposal, rejectVerdict } from './model.js';
export {
	createOrchestrator,
	isSettled,
	type Orchestrator,
	type OrchestratorDeps,
	type RevisionResult,
	type TaskOptions,
} from './orchestrator.js';
export { createSession, type Session, type SessionOptions } from './session.js';
export type {
	CommandProposal,
	ExecutionResult,
	Proposer,
	RejectionCategory,
	Result,
	Reviewer,
	ReviewVerdict,
	TaskRecord,
	TaskState,
	VerificationOutcome,
} from './types.js';
