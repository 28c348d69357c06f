import { mkdir, mkdtemp, realpath, rm } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createInMemoryAuditStore } from '../sandbox/audit.js';
import type { AuditStore } from '../sandbox/types.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface SessionOptions {
	/** Use this directory as the root instead of a fresh temporary one. */
	sandboxRoot?: string;
	/** Parent for the temporary root; the OS temp dir by default. */
	baseDir?: string;
	purgeOnClose?: boolean;
	audit?: AuditStore;
}

/** Everything one run shares: an id, one sandbox root, a bound logger and the audit log. */
export interface Session {
	readonly id: string;
	readonly sandboxRoot: string;
	readonly logger: Logger;
	readonly audit: AuditStore;
	close(): Promise<void>;
}

export async function createSession(options: SessionOptions = {}): Promise<Session> {
	const id = uuidv4();
	let root: string;
	if (options.sandboxRoot) {
		const requested = path.resolve(options.sandboxRoot);
		await mkdir(requested, { recursive: true });
		root = await realpath(requested);
	} else {
		const base = options.baseDir ?? tmpdir();
		await mkdir(base, { recursive: true });
		root = await realpath(await mkdtemp(path.join(base, 'shellgate-')));
	}

	const logger = createLogger('core:session').child({ sessionId: id });
	const audit = options.audit ?? createInMemoryAuditStore();
	const purgeOnClose = options.purgeOnClose ?? true;
	let closed = false;

	logger.info('Session started', { sandboxRoot: root, purgeOnClose });

	async function close(): Promise<void> {
		if (closed) return;
		closed = true;
		if (!purgeOnClose) {
			logger.info('Session closed', { sandboxRoot: root });
			return;
		}
		if (root === path.parse(root).root || root === homedir()) {
			logger.warn('Refusing to purge sandbox root', { sandboxRoot: root });
			return;
		}
		await rm(root, { recursive: true, force: true });
		logger.info('Session closed, sandbox purged', { sandboxRoot: root });
	}

	return { id, sandboxRoot: root, logger, audit, close };
}
