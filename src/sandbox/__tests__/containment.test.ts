import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { canonicalRoot, expandHomeToken, isWithin, resolveInsideRoot, resolvePathToken } from '../containment.js';

let root: string;
let outside: string;

beforeAll(() => {
	root = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-containment-')));
	outside = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-containment-out-')));
	mkdirSync(join(root, 'data'));
	symlinkSync(outside, join(root, 'escape'));
	symlinkSync(join(outside, 'not-yet'), join(root, 'dangling'));
});

afterAll(() => {
	rmSync(root, { recursive: true, force: true });
	rmSync(outside, { recursive: true, force: true });
});

describe('expandHomeToken', () => {
	it('expands ~, $HOME and ${HOME} at the start only', () => {
		expect(expandHomeToken('~', '/home/tester')).toBe('/home/tester');
		expect(expandHomeToken('~/notes', '/home/tester')).toBe('/home/tester/notes');
		expect(expandHomeToken('$HOME/notes', '/home/tester')).toBe('/home/tester/notes');
		expect(expandHomeToken('${HOME}', '/home/tester')).toBe('/home/tester');
		expect(expandHomeToken('$HOMEDIR/x', '/home/tester')).toBe('$HOMEDIR/x');
		expect(expandHomeToken('a/~/b', '/home/tester')).toBe('a/~/b');
	});
});

describe('isWithin', () => {
	it('accepts the root itself and paths beneath it', () => {
		expect(isWithin('/srv/box', '/srv/box')).toBe(true);
		expect(isWithin('/srv/box', '/srv/box/a/b')).toBe(true);
		expect(isWithin('/srv/box', '/srv/box/..hidden')).toBe(true);
	});

	it('rejects siblings, parents and prefixes', () => {
		expect(isWithin('/srv/box', '/srv')).toBe(false);
		expect(isWithin('/srv/box', '/srv/box2')).toBe(false);
		expect(isWithin('/srv/box', '/etc/passwd')).toBe(false);
	});
});

describe('resolvePathToken', () => {
	it('normalizes .. lexically for missing paths', () => {
		expect(resolvePathToken('data/../new/file.txt', root)).toEqual({
			lexical: join(root, 'new/file.txt'),
			real: join(root, 'new/file.txt'),
		});
	});

	it('follows a symlinked ancestor', () => {
		expect(resolvePathToken('escape/file.txt', root).real).toBe(join(outside, 'file.txt'));
	});

	it('follows a dangling symlink to where it points', () => {
		expect(resolvePathToken('dangling', root).real).toBe(join(outside, 'not-yet'));
	});
});

describe('canonicalRoot', () => {
	it('rejects a relative root', () => {
		expect(() => canonicalRoot('box')).toThrow('Sandbox root must be an absolute path, got "box"');
	});

	it('returns the real path of the root', () => {
		expect(canonicalRoot(join(root, 'data', '..'))).toBe(root);
	});
});

describe('resolveInsideRoot', () => {
	it('reports whether a path stays inside', () => {
		expect(resolveInsideRoot(root, 'data/file.txt')).toEqual({ path: join(root, 'data/file.txt'), inside: true });
		expect(resolveInsideRoot(root, '../file.txt').inside).toBe(false);
		expect(resolveInsideRoot(root, 'escape/file.txt').inside).toBe(false);
	});
});
