import { describe, expect, it } from 'vitest';
import { InvalidPatch } from '../../core/errors.js';
import { applyHunks, type PatchHunk, parsePatch, patchPaths, planPatch } from '../patch.js';

function patchOf(...lines: string[]): string {
	return ['*** Begin Patch', ...lines, '*** End Patch'].join('\n');
}

function hunksOf(...lines: string[]): PatchHunk[] {
	const [operation] = parsePatch(patchOf('*** Update File: a.txt', ...lines));
	if (operation?.type !== 'update') throw new Error('expected an update');
	return operation.hunks;
}

describe('parsePatch', () => {
	it('reads add, delete and update sections', () => {
		const operations = parsePatch(
			patchOf(
				'*** Add File: notes/new.txt',
				'+first',
				'+second',
				'*** Delete File: old.txt',
				'*** Update File: greeting.txt',
				'*** Move to: salutation.txt',
				'@@ hello world',
				' keep',
				'-hello again',
				'+goodbye again',
			),
		);

		expect(operations).toEqual([
			{ type: 'add', path: 'notes/new.txt', content: 'first\nsecond\n' },
			{ type: 'delete', path: 'old.txt' },
			{
				type: 'update',
				path: 'greeting.txt',
				moveTo: 'salutation.txt',
				hunks: [
					{
						anchor: 'hello world',
						endOfFile: false,
						lines: [
							{ kind: 'context', text: 'keep' },
							{ kind: 'delete', text: 'hello again' },
							{ kind: 'add', text: 'goodbye again' },
						],
					},
				],
			},
		]);
		expect(patchPaths(operations)).toEqual({
			reads: ['greeting.txt'],
			writes: ['notes/new.txt', 'old.txt', 'salutation.txt', 'greeting.txt'],
		});
	});

	it('accepts CRLF line endings and trailing blank lines', () => {
		const text = ['*** Begin Patch', '*** Delete File: old.txt', '', '*** End Patch', ''].join('\r\n');
		expect(parsePatch(text)).toEqual([{ type: 'delete', path: 'old.txt' }]);
	});

	it('rejects malformed patches', () => {
		expect(() => parsePatch('*** Delete File: a.txt')).toThrow('Patch is missing the *** Begin Patch line');
		expect(() => parsePatch('*** Begin Patch\n*** Delete File: a.txt')).toThrow(
			'Patch is missing the *** End Patch line',
		);
		expect(() => parsePatch(patchOf())).toThrow('Patch changes no files');
		expect(() => parsePatch(patchOf('*** Delete File: a.txt', '*** Delete File: a.txt'))).toThrow(
			'Patch touches a.txt more than once',
		);
		expect(() => parsePatch(patchOf('*** Add File: a.txt', 'oops'))).toThrow(
			'Line in added file a.txt must start with "+": oops',
		);
		expect(() => parsePatch(patchOf('*** Update File: a.txt'))).toThrow('Update of a.txt has no changes');
		expect(() => parsePatch(patchOf('*** Update File: a.txt', '@@'))).toThrow('Update of a.txt has an empty hunk');
		expect(() => parsePatch(patchOf('rm -rf /'))).toThrow(InvalidPatch);
	});
});

describe('applyHunks', () => {
	it('replaces lines located by their context', () => {
		expect(applyHunks('a\nb\nc\nd\n', hunksOf(' b', '-c', '+C'), 'a.txt')).toBe('a\nb\nC\nd\n');
	});

	it('falls back to matching without surrounding whitespace', () => {
		const hunks = hunksOf(' def f():', '-return 1', '+    return 2');
		expect(applyHunks('def f():\n    return 1\n', hunks, 'a.txt')).toBe('def f():\n    return 2\n');
	});

	it('starts the search after the @@ anchor line', () => {
		expect(applyHunks('x = 1\n[b]\nx = 1\n', hunksOf('@@ [b]', '-x = 1', '+x = 2'), 'a.txt')).toBe(
			'x = 1\n[b]\nx = 2\n',
		);
	});

	it('pins end-of-file hunks to the last lines', () => {
		expect(applyHunks('end\nmiddle\nend\n', hunksOf(' end', '+tail', '*** End of File'), 'a.txt')).toBe(
			'end\nmiddle\nend\ntail\n',
		);
	});

	it('keeps a missing final newline missing', () => {
		expect(applyHunks('one\ntwo', hunksOf('-two', '+three'), 'a.txt')).toBe('one\nthree');
	});

	it('fails when the context is not in the file', () => {
		expect(() => applyHunks('a\n', hunksOf('-zzz'), 'a.txt')).toThrow('a.txt: context not found in the file:\nzzz');
	});
});

describe('planPatch', () => {
	const files = new Map([
		['a.txt', 'one\n'],
		['gone.txt', 'x\n'],
	]);
	const read = (path: string) => files.get(path);

	it('works out every change before anything is written', () => {
		const operations = parsePatch(
			patchOf(
				'*** Add File: new.txt',
				'+hi',
				'*** Delete File: gone.txt',
				'*** Update File: a.txt',
				'*** Move to: b.txt',
				'-one',
				'+uno',
			),
		);
		expect(planPatch(operations, read)).toEqual([
			{ kind: 'added', path: 'new.txt', content: 'hi\n' },
			{ kind: 'deleted', path: 'gone.txt' },
			{ kind: 'moved', path: 'a.txt', movedTo: 'b.txt', content: 'uno\n' },
		]);
	});

	it('refuses to add over or update a missing file', () => {
		expect(() => planPatch(parsePatch(patchOf('*** Add File: a.txt', '+x')), read)).toThrow(
			'Cannot add a.txt: it already exists',
		);
		expect(() => planPatch(parsePatch(patchOf('*** Update File: missing.txt', '-x', '+y')), read)).toThrow(
			'Cannot update missing.txt: it does not exist',
		);
	});
});
