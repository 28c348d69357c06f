import { homedir, platform } from 'node:os';
import { join } from 'node:path';
import type { Platform } from './schema.js';

/**
 * Resolves the base directory for shellgate's data.
 * Checks SHELLGATE_HOME env var first, then uses platform-specific defaults.
 */
export function getShellgateHome(): string {
	const envHome = process.env.SHELLGATE_HOME;
	if (envHome) return envHome;

	const home = homedir();
	if (platform() === 'darwin') {
		return join(home, '.shellgate');
	}
	// Linux: respect XDG_DATA_HOME if set
	const xdgData = process.env.XDG_DATA_HOME;
	if (xdgData) {
		return join(xdgData, 'shellgate');
	}
	return join(home, '.shellgate');
}

export function getDefaultConfigPath(): string {
	return join(getShellgateHome(), 'config.yaml');
}

/** macOS ships BSD userland; everything else is assumed to be GNU. */
export function detectPlatform(): Platform {
	const os = platform();
	return os === 'darwin' || os === 'freebsd' || os === 'openbsd' ? 'bsd' : 'gnu';
}

/**
 * Expands a leading `~` against the given home directory.
 */
export function expandHome(value: string, home: string = homedir()): string {
	if (value === '~') return home;
	if (value.startsWith('~/')) return join(home, value.slice(2));
	return value;
}
