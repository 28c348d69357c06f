import { existsSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createInMemoryAuditStore } from '../../sandbox/audit.js';
import { createSession } from '../session.js';

let base: string;

beforeEach(() => {
	base = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-session-')));
});

afterEach(() => {
	rmSync(base, { recursive: true, force: true });
});

describe('createSession', () => {
	it('creates a fresh canonical root under the base directory', async () => {
		const session = await createSession({ baseDir: base });

		expect(dirname(session.sandboxRoot)).toBe(base);
		expect(session.sandboxRoot.startsWith(join(base, 'shellgate-'))).toBe(true);
		expect(existsSync(session.sandboxRoot)).toBe(true);
		await session.close();
	});

	it('gives every session its own id and root', async () => {
		const first = await createSession({ baseDir: base });
		const second = await createSession({ baseDir: base });

		expect(first.id).not.toBe(second.id);
		expect(first.sandboxRoot).not.toBe(second.sandboxRoot);
		await first.close();
		await second.close();
	});

	it('purges the root on close, once', async () => {
		const session = await createSession({ baseDir: base });
		writeFileSync(join(session.sandboxRoot, 'left-behind.txt'), 'x');

		await session.close();
		expect(existsSync(session.sandboxRoot)).toBe(false);
		await expect(session.close()).resolves.toBeUndefined();
	});

	it('keeps a named root when purging is off', async () => {
		const named = join(base, 'workspace', 'nested');
		const session = await createSession({ sandboxRoot: named, purgeOnClose: false });

		expect(session.sandboxRoot).toBe(named);
		await session.close();
		expect(existsSync(named)).toBe(true);
	});

	it('uses the audit store it is given', async () => {
		const audit = createInMemoryAuditStore();
		const session = await createSession({ baseDir: base, audit });
		expect(session.audit).toBe(audit);
		await session.close();
	});
});
