import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createAuditStore, createInMemoryAuditStore } from '../audit.js';
import type { AuditEntry, AuditStore } from '../types.js';

let testDir: string;

beforeEach(() => {
	testDir = mkdtempSync(join(tmpdir(), 'shellgate-audit-'));
});

afterEach(() => {
	rmSync(testDir, { recursive: true, force: true });
});

function makeEntry(overrides?: Partial<AuditEntry>): AuditEntry {
	return {
		id: `test-${Date.now()}-${Math.random()}`,
		timestamp: new Date(),
		sessionId: 'session-1',
		proposalId: 'proposal-1',
		stage: 'execute',
		command: 'ls -la',
		decision: 'approved',
		result: 'success',
		durationMs: 5,
		...overrides,
	};
}

const stores: Array<[string, () => AuditStore]> = [
	['sqlite', () => createAuditStore(join(testDir, 'audit.db'))],
	['in-memory', () => createInMemoryAuditStore()],
];

describe.each(stores)('AuditStore (%s)', (_name, open) => {
	it('stores and retrieves audit entries', () => {
		const store = open();
		store.log(makeEntry({ id: 'entry-1', detail: 'Passed 5 safety classifiers' }));

		const recent = store.getRecent(10);
		expect(recent).toHaveLength(1);
		expect(recent[0]).toMatchObject({
			id: 'entry-1',
			sessionId: 'session-1',
			stage: 'execute',
			command: 'ls -la',
			detail: 'Passed 5 safety classifiers',
		});
		expect(recent[0]?.output).toBeUndefined();

		store.close();
	});

	it('returns the most recent entries first', () => {
		const store = open();
		store.log(makeEntry({ id: 'first', timestamp: new Date('2024-01-01') }));
		store.log(makeEntry({ id: 'second', timestamp: new Date('2024-01-02') }));
		store.log(makeEntry({ id: 'third', timestamp: new Date('2024-01-03') }));

		expect(store.getRecent(2).map((entry) => entry.id)).toEqual(['third', 'second']);
		store.close();
	});

	it('filters by stage, decision and session', () => {
		const store = open();
		store.log(makeEntry({ id: 'review-ok', stage: 'review', decision: 'approved' }));
		store.log(makeEntry({ id: 'review-no', stage: 'review', decision: 'rejected', result: 'denied' }));
		store.log(makeEntry({ id: 'violation', decision: 'violation', result: 'denied', sessionId: 'session-2' }));

		expect(store.query({ stage: 'review' })).toHaveLength(2);
		expect(store.query({ decision: 'violation' }).map((entry) => entry.id)).toEqual(['violation']);
		expect(store.query({ sessionId: 'session-2' }).map((entry) => entry.id)).toEqual(['violation']);
		store.close();
	});

	it('filters by time range', () => {
		const store = open();
		store.log(makeEntry({ id: 'old', timestamp: new Date('2024-01-01') }));
		store.log(makeEntry({ id: 'mid', timestamp: new Date('2024-06-01') }));
		store.log(makeEntry({ id: 'new', timestamp: new Date('2024-12-01') }));

		const filtered = store.query({ since: new Date('2024-03-01'), until: new Date('2024-09-01') });
		expect(filtered.map((entry) => entry.id)).toEqual(['mid']);
		store.close();
	});

	it('truncates stored output to 1 KiB', () => {
		const store = open();
		store.log(makeEntry({ id: 'long', output: 'x'.repeat(5000) }));

		expect(store.getRecent(1)[0]?.output).toBe(`${'x'.repeat(1024)}... [truncated]`);
		store.close();
	});

	it('redacts secrets in commands and output', () => {
		const store = open();
		store.log(
			makeEntry({
				id: 'secret',
				command: 'DEPLOY_TOKEN=test-secret ./deploy.sh',
				output: 'MY_API_KEY=test-secret',
			}),
		);

		const [entry] = store.getRecent(1);
		expect(entry?.command).toBe('DEPLOY_TOKEN=[REDACTED] ./deploy.sh');
		expect(entry?.output).toBe('MY_API_KEY=[REDACTED]');
		store.close();
	});
});

describe('createAuditStore', () => {
	it('falls back to memory when the database cannot be opened', () => {
		const store = createAuditStore(join(testDir, 'missing-dir', 'nested', 'audit.db'));
		store.log(makeEntry({ id: 'fallback' }));
		expect(store.getRecent(1)[0]?.id).toBe('fallback');
		store.close();
	});
});
