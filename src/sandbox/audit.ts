import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { truncateBytes } from '../utils/text.js';
import type { AuditDecision, AuditEntry, AuditFilters, AuditResult, AuditStage, AuditStore } from './types.js';

const logger = createLogger('sandbox:audit');

const MAX_STORED_OUTPUT = 1024;
const MAX_QUERY_ROWS = 1000;

const STAGES: readonly AuditStage[] = ['review', 'execute', 'verify'];
const DECISIONS: readonly AuditDecision[] = ['approved', 'rejected', 'violation', 'denied', 'error'];
const RESULTS: readonly AuditResult[] = ['success', 'failure', 'denied', 'timeout'];

function toStoredEntry(entry: AuditEntry): AuditEntry {
	return {
		...entry,
		command: redactSecrets(entry.command),
		detail: entry.detail === undefined ? undefined : redactSecrets(entry.detail),
		output: entry.output === undefined ? undefined : truncateBytes(redactSecrets(entry.output), MAX_STORED_OUTPUT),
	};
}

/** Audit store that lives only as long as the process. */
export function createInMemoryAuditStore(): AuditStore {
	const entries: AuditEntry[] = [];

	function sortNewest(items: AuditEntry[]): AuditEntry[] {
		return [...items].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
	}

	return {
		log(entry: AuditEntry): void {
			entries.push(toStoredEntry(entry));
		},
		query(filters: AuditFilters): AuditEntry[] {
			const filtered = entries.filter((entry) => {
				if (filters.stage && entry.stage !== filters.stage) return false;
				if (filters.decision && entry.decision !== filters.decision) return false;
				if (filters.sessionId && entry.sessionId !== filters.sessionId) return false;
				if (filters.since && entry.timestamp < filters.since) return false;
				if (filters.until && entry.timestamp > filters.until) return false;
				return true;
			});
			return sortNewest(filtered).slice(0, MAX_QUERY_ROWS);
		},
		getRecent(limit: number): AuditEntry[] {
			return sortNewest(entries).slice(0, limit);
		},
		close(): void {
			// Nothing to release
		},
	};
}

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
	return allowed.find((candidate) => candidate === value) ?? fallback;
}

function optionalText(value: unknown): string | undefined {
	return typeof value === 'string' ? value : undefined;
}

function rowToEntry(row: unknown): AuditEntry {
	const record: Record<string, unknown> = row !== null && typeof row === 'object' ? { ...row } : {};
	return {
		id: String(record.id),
		timestamp: new Date(String(record.timestamp)),
		sessionId: String(record.session_id ?? ''),
		proposalId: String(record.proposal_id ?? ''),
		stage: pick(STAGES, record.stage, 'review'),
		command: String(record.command ?? ''),
		decision: pick(DECISIONS, record.decision, 'error'),
		result: pick(RESULTS, record.result, 'failure'),
		detail: optionalText(record.detail),
		output: optionalText(record.output),
		durationMs: Number(record.duration_ms ?? 0),
	};
}

/**
 * Creates an append-only audit log backed by SQLite.
 * Uses WAL mode for crash safety and falls back to memory when the file
 * cannot be opened.
 */
export function createAuditStore(dbPath: string): AuditStore {
	let db: InstanceType<typeof Database>;
	try {
		db = new Database(dbPath);
	} catch (err: unknown) {
		const reason = err instanceof Error ? err.message : String(err);
		logger.warn('SQLite audit store unavailable, using in-memory fallback', { reason });
		return createInMemoryAuditStore();
	}

	db.pragma('journal_mode = WAL');

	db.exec(`
		CREATE TABLE IF NOT EXISTS audit_log (
			id TEXT PRIMARY KEY,
			timestamp TEXT NOT NULL,
			session_id TEXT NOT NULL,
			proposal_id TEXT NOT NULL,
			stage TEXT NOT NULL,
			command TEXT NOT NULL,
			decision TEXT NOT NULL,
			result TEXT NOT NULL,
			detail TEXT,
			output TEXT,
			duration_ms INTEGER
		)
	`);

	db.exec(`
		CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_log(timestamp);
		CREATE INDEX IF NOT EXISTS idx_audit_session ON audit_log(session_id);
		CREATE INDEX IF NOT EXISTS idx_audit_decision ON audit_log(decision);
	`);

	const insertStmt = db.prepare(`
		INSERT INTO audit_log (id, timestamp, session_id, proposal_id, stage, command, decision, result, detail, output, duration_ms)
		VALUES (@id, @timestamp, @sessionId, @proposalId, @stage, @command, @decision, @result, @detail, @output, @durationMs)
	`);

	const queryStmt = db.prepare(`
		SELECT * FROM audit_log
		WHERE (@stage IS NULL OR stage = @stage)
		AND (@decision IS NULL OR decision = @decision)
		AND (@sessionId IS NULL OR session_id = @sessionId)
		AND (@since IS NULL OR timestamp >= @since)
		AND (@until IS NULL OR timestamp <= @until)
		ORDER BY timestamp DESC
		LIMIT ${MAX_QUERY_ROWS}
	`);

	const recentStmt = db.prepare(`
		SELECT * FROM audit_log ORDER BY timestamp DESC LIMIT ?
	`);

	function log(entry: AuditEntry): void {
		const stored = toStoredEntry(entry);
		insertStmt.run({
			id: stored.id,
			timestamp: stored.timestamp.toISOString(),
			sessionId: stored.sessionId,
			proposalId: stored.proposalId,
			stage: stored.stage,
			command: stored.command,
			decision: stored.decision,
			result: stored.result,
			detail: stored.detail ?? null,
			output: stored.output ?? null,
			durationMs: stored.durationMs,
		});

		logger.debug('Audit entry logged', {
			id: stored.id,
			stage: stored.stage,
			decision: stored.decision,
			result: stored.result,
		});
	}

	function query(filters: AuditFilters): AuditEntry[] {
		const rows = queryStmt.all({
			stage: filters.stage ?? null,
			decision: filters.decision ?? null,
			sessionId: filters.sessionId ?? null,
			since: filters.since?.toISOString() ?? null,
			until: filters.until?.toISOString() ?? null,
		});
		return rows.map(rowToEntry);
	}

	function getRecent(limit: number): AuditEntry[] {
		return recentStmt.all(limit).map(rowToEntry);
	}

	function close(): void {
		db.close();
	}

	return { log, query, getRecent, close };
}
