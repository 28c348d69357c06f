export type AuditStage = 'review' | 'execute' | 'verify';
export type AuditDecision = 'approved' | 'rejected' | 'violation' | 'denied' | 'error';
export type AuditResult = 'success' | 'failure' | 'denied' | 'timeout';

/** One row of the append-only audit log. */
export interface AuditEntry {
	id: string;
	timestamp: Date;
	sessionId: string;
	proposalId: string;
	stage: AuditStage;
	command: string;
	decision: AuditDecision;
	result: AuditResult;
	detail?: string;
	output?: string;
	durationMs: number;
}

export interface AuditFilters {
	stage?: AuditStage;
	decision?: AuditDecision;
	sessionId?: string;
	since?: Date;
	until?: Date;
}

export interface AuditStore {
	log(entry: AuditEntry): void;
	query(filters: AuditFilters): AuditEntry[];
	getRecent(limit: number): AuditEntry[];
	close(): void;
}

export interface RunOptions {
	/** Directory inside the sandbox root; defaults to the root. */
	workingDir?: string;
	timeoutMs?: number;
}
