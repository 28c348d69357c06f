import { InvalidPatch } from '../core/errors.js';

const BEGIN_PATCH = '*** Begin Patch';
const END_PATCH = '*** End Patch';
const ADD_FILE = '*** Add File: ';
const DELETE_FILE = '*** Delete File: ';
const UPDATE_FILE = '*** Update File: ';
const MOVE_TO = '*** Move to: ';
const END_OF_FILE = '*** End of File';
const FILE_HEADERS = [ADD_FILE, DELETE_FILE, UPDATE_FILE];

export interface PatchLine {
	kind: 'context' | 'add' | 'delete';
	text: string;
}

/** One `@@` section of an update. */
export interface PatchHunk {
	/** Text after `@@`: a line the hunk must come after. */
	anchor: string | null;
	lines: PatchLine[];
	/** Set by `*** End of File`: the hunk's context must end the file. */
	endOfFile: boolean;
}

export type PatchOperation =
	| { type: 'add'; path: string; content: string }
	| { type: 'delete'; path: string }
	| { type: 'update'; path: string; moveTo: string | null; hunks: PatchHunk[] };

export type PlannedChange =
	| { kind: 'added'; path: string; content: string }
	| { kind: 'updated'; path: string; content: string }
	| { kind: 'moved'; path: string; movedTo: string; content: string }
	| { kind: 'deleted'; path: string };

/** Current contents of a file named by a patch, or `undefined` when it does not exist. */
export type ReadPatchedFile = (path: string) => string | undefined;

function isFileHeader(line: string): boolean {
	return FILE_HEADERS.some((header) => line.startsWith(header));
}

function parseHunks(body: readonly string[], start: number, path: string): { hunks: PatchHunk[]; next: number } {
	const hunks: PatchHunk[] = [];
	let current: PatchHunk | undefined;
	let i = start;

	for (; i < body.length; i++) {
		const line = body[i] ?? '';
		if (isFileHeader(line)) break;

		if (line === END_OF_FILE) {
			if (!current) throw new InvalidPatch(`${END_OF_FILE} in update of ${path} follows no hunk`);
			current.endOfFile = true;
			current = undefined;
			continue;
		}
		if (line.startsWith('@@')) {
			const anchor = line.slice(2).trim();
			current = { anchor: anchor === '' ? null : anchor, lines: [], endOfFile: false };
			hunks.push(current);
			continue;
		}
		if (line.startsWith('***')) {
			throw new InvalidPatch(`Unexpected line in update of ${path}: ${line}`);
		}

		if (!current) {
			current = { anchor: null, lines: [], endOfFile: false };
			hunks.push(current);
		}
		const marker = line.charAt(0);
		if (marker === '+') current.lines.push({ kind: 'add', text: line.slice(1) });
		else if (marker === '-') current.lines.push({ kind: 'delete', text: line.slice(1) });
		else if (marker === ' ') current.lines.push({ kind: 'context', text: line.slice(1) });
		else if (line === '') current.lines.push({ kind: 'context', text: '' });
		else throw new InvalidPatch(`Line in update of ${path} must start with " ", "+" or "-": ${line}`);
	}

	if (hunks.length === 0) throw new InvalidPatch(`Update of ${path} has no changes`);
	if (hunks.some((hunk) => hunk.lines.length === 0)) throw new InvalidPatch(`Update of ${path} has an empty hunk`);
	return { hunks, next: i };
}

/**
 * Parses patch text in the `*** Begin Patch` / `*** End Patch` format:
 * `*** Add File:` sections of `+` lines, `*** Delete File:` headers, and
 * `*** Update File:` sections (optionally followed by `*** Move to:`) made
 * of `@@` hunks with ` `, `-` and `+` lines.
 */
export function parsePatch(text: string): PatchOperation[] {
	const lines = text.split(/\r?\n/);
	const begin = lines.findIndex((line) => line.startsWith(BEGIN_PATCH));
	if (begin === -1) throw new InvalidPatch(`Patch is missing the ${BEGIN_PATCH} line`);
	const end = lines.lastIndexOf(END_PATCH);
	if (end < begin) throw new InvalidPatch(`Patch is missing the ${END_PATCH} line`);

	const body = lines.slice(begin + 1, end);
	while (body.length > 0 && body[body.length - 1] === '') body.pop();
	const operations: PatchOperation[] = [];
	const claimed = new Set<string>();
	const claim = (path: string): string => {
		if (path === '') throw new InvalidPatch('Patch names an empty path');
		if (claimed.has(path)) throw new InvalidPatch(`Patch touches ${path} more than once`);
		claimed.add(path);
		return path;
	};

	let i = 0;
	while (i < body.length) {
		const line = body[i] ?? '';

		if (line.startsWith(UPDATE_FILE)) {
			const path = claim(line.slice(UPDATE_FILE.length).trim());
			i++;
			let moveTo: string | null = null;
			const next = body[i];
			if (next?.startsWith(MOVE_TO)) {
				moveTo = claim(next.slice(MOVE_TO.length).trim());
				i++;
			}
			const parsed = parseHunks(body, i, path);
			operations.push({ type: 'update', path, moveTo, hunks: parsed.hunks });
			i = parsed.next;
			continue;
		}

		if (line.startsWith(DELETE_FILE)) {
			operations.push({ type: 'delete', path: claim(line.slice(DELETE_FILE.length).trim()) });
			i++;
			continue;
		}

		if (line.startsWith(ADD_FILE)) {
			const path = claim(line.slice(ADD_FILE.length).trim());
			const added: string[] = [];
			for (i++; i < body.length; i++) {
				const content = body[i] ?? '';
				if (isFileHeader(content)) break;
				if (!content.startsWith('+')) throw new InvalidPatch(`Line in added file ${path} must start with "+": ${content}`);
				added.push(`${content.slice(1)}\n`);
			}
			operations.push({ type: 'add', path, content: added.join('') });
			continue;
		}

		if (line.trim() !== '') throw new InvalidPatch(`Unexpected patch line: ${line}`);
		i++;
	}

	if (operations.length === 0) throw new InvalidPatch('Patch changes no files');
	return operations;
}

/** Paths a patch reads and the paths it creates, changes or removes. */
export function patchPaths(operations: readonly PatchOperation[]): { reads: string[]; writes: string[] } {
	const reads: string[] = [];
	const writes: string[] = [];
	for (const operation of operations) {
		if (operation.type === 'update') {
			reads.push(operation.path);
			if (operation.moveTo !== null) writes.push(operation.moveTo);
		}
		writes.push(operation.path);
	}
	return { reads, writes };
}

// Exact match first, then ignoring trailing and finally all surrounding whitespace.
const NORMALIZERS: ReadonlyArray<(line: string) => string> = [
	(line) => line,
	(line) => line.trimEnd(),
	(line) => line.trim(),
];

function findBlock(fileLines: readonly string[], block: readonly string[], from: number, endOfFile: boolean): number {
	if (block.length === 0) return endOfFile ? fileLines.length : from;

	for (const normalize of NORMALIZERS) {
		const wanted = block.map(normalize);
		const fits = (start: number) => wanted.every((text, offset) => normalize(fileLines[start + offset] ?? '') === text);

		if (endOfFile) {
			const start = fileLines.length - block.length;
			if (start >= from && fits(start)) return start;
			continue;
		}
		for (let start = from; start + block.length <= fileLines.length; start++) {
			if (fits(start)) return start;
		}
	}
	return -1;
}

function findAnchor(fileLines: readonly string[], anchor: string, from: number): number {
	for (const normalize of NORMALIZERS) {
		const wanted = normalize(anchor);
		for (let i = from; i < fileLines.length; i++) {
			if (normalize(fileLines[i] ?? '') === wanted) return i;
		}
	}
	return -1;
}

/**
 * Applies the hunks of one update to `original`. Hunks apply in order and
 * each searches from where the previous one ended. Context lines keep the
 * file's own text, so a whitespace-only mismatch does not rewrite them.
 */
export function applyHunks(original: string, hunks: readonly PatchHunk[], path: string): string {
	const endsWithNewline = original.endsWith('\n');
	const fileLines = original === '' ? [] : (endsWithNewline ? original.slice(0, -1) : original).split('\n');
	const result: string[] = [];
	let cursor = 0;

	for (const hunk of hunks) {
		let from = cursor;
		if (hunk.anchor !== null) {
			const anchorAt = findAnchor(fileLines, hunk.anchor, cursor);
			if (anchorAt === -1) throw new InvalidPatch(`${path}: context "@@ ${hunk.anchor}" not found`);
			from = anchorAt + 1;
		}

		const before = hunk.lines.filter((line) => line.kind !== 'add').map((line) => line.text);
		const at = findBlock(fileLines, before, from, hunk.endOfFile);
		if (at === -1) {
			const where = hunk.endOfFile ? 'at the end of the file' : 'in the file';
			throw new InvalidPatch(`${path}: context not found ${where}:\n${before.join('\n')}`);
		}

		result.push(...fileLines.slice(cursor, at));
		let position = at;
		for (const line of hunk.lines) {
			if (line.kind === 'add') {
				result.push(line.text);
				continue;
			}
			if (line.kind === 'context') result.push(fileLines[position] ?? line.text);
			position++;
		}
		cursor = position;
	}

	result.push(...fileLines.slice(cursor));
	if (result.length === 0) return '';
	return `${result.join('\n')}${endsWithNewline || original === '' ? '\n' : ''}`;
}

/**
 * Works out every file's new content before anything is written, so a
 * patch that fails anywhere changes nothing.
 */
export function planPatch(operations: readonly PatchOperation[], read: ReadPatchedFile): PlannedChange[] {
	return operations.map((operation): PlannedChange => {
		const current = read(operation.path);
		switch (operation.type) {
			case 'add':
				if (current !== undefined) throw new InvalidPatch(`Cannot add ${operation.path}: it already exists`);
				return { kind: 'added', path: operation.path, content: operation.content };
			case 'delete':
				if (current === undefined) throw new InvalidPatch(`Cannot delete ${operation.path}: it does not exist`);
				return { kind: 'deleted', path: operation.path };
			case 'update': {
				if (current === undefined) throw new InvalidPatch(`Cannot update ${operation.path}: it does not exist`);
				const content = applyHunks(current, operation.hunks, operation.path);
				if (operation.moveTo === null) return { kind: 'updated', path: operation.path, content };
				if (read(operation.moveTo) !== undefined) {
					throw new InvalidPatch(`Cannot move ${operation.path} to ${operation.moveTo}: it already exists`);
				}
				return { kind: 'moved', path: operation.path, movedTo: operation.moveTo, content };
			}
		}
	});
}
