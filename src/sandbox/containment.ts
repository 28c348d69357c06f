import { lstatSync, readlinkSync, realpathSync } from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';

const MAX_SYMLINK_HOPS = 40;

export interface ResolvedPath {
	/** `path.resolve` of the expanded token, no symlinks followed. */
	lexical: string;
	/** Same path with symlinks of its existing ancestors followed. */
	real: string;
}

/**
 * Expands `~`, `$HOME` and `${HOME}` at the start of a path token.
 * Other parameter expansions are left alone.
 */
export function expandHomeToken(raw: string, home: string = homedir()): string {
	if (raw === '~') return home;
	if (raw.startsWith('~/')) return path.join(home, raw.slice(2));
	const match = raw.match(/^(?:\$HOME|\$\{HOME\})(?=\/|$)/);
	if (match) return home + raw.slice(match[0].length);
	return raw;
}

/**
 * Follows symlinks on the longest existing prefix of `absolute`. Missing
 * trailing components are appended unchanged, and a dangling link is
 * followed to where it points.
 */
function realpathOfExistingAncestor(absolute: string, hops = 0): string {
	let current = absolute;
	const missing: string[] = [];

	while (true) {
		const stats = lstatSync(current, { throwIfNoEntry: false });
		if (stats?.isSymbolicLink() && hops < MAX_SYMLINK_HOPS) {
			const target = path.resolve(path.dirname(current), readlinkSync(current));
			return realpathOfExistingAncestor(path.join(target, ...missing.reverse()), hops + 1);
		}
		if (stats) {
			const real = realpathSync(current);
			return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
		}
		const parent = path.dirname(current);
		if (parent === current) return absolute;
		missing.push(path.basename(current));
		current = parent;
	}
}

/** Canonical form of a sandbox root. The root must be absolute. */
export function canonicalRoot(sandboxRoot: string): string {
	if (!path.isAbsolute(sandboxRoot)) {
		throw new Error(`Sandbox root must be an absolute path, got "${sandboxRoot}"`);
	}
	return realpathOfExistingAncestor(path.resolve(sandboxRoot));
}

export function resolvePathToken(raw: string, baseDir: string, home?: string): ResolvedPath {
	const lexical = path.resolve(baseDir, expandHomeToken(raw, home));
	return { lexical, real: realpathOfExistingAncestor(lexical) };
}

/** True when `target` is `root` or lies beneath it. Both must be absolute. */
export function isWithin(root: string, target: string): boolean {
	const rel = path.relative(root, target);
	return rel === '' || (rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel));
}

/**
 * Resolves a sandbox-relative path and reports whether it stays inside the
 * root. Used by the verifier and the executor's own check.
 */
export function resolveInsideRoot(
	sandboxRoot: string,
	raw: string,
	baseDir: string = sandboxRoot,
): { path: string; inside: boolean } {
	const root = canonicalRoot(sandboxRoot);
	const resolved = resolvePathToken(raw, baseDir);
	return { path: resolved.real, inside: isWithin(root, resolved.real) };
}
