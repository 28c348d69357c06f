/** File effects of a sed or awk program beyond its input operands. */
export interface ScriptEffects {
	/** Files the program reads. */
	reads: string[];
	/** Files the program writes. */
	writes: string[];
	/** Set when the program runs commands or names files only known at run time. */
	opaque: string | null;
}

// GNU sed treats these as the standard streams, not files.
const SED_STREAM_FILES = new Set(['/dev/stdout', '/dev/stderr']);

function isBlank(char: string | undefined): boolean {
	return char === ' ' || char === '\t';
}

function skipBlanks(script: string, start: number): number {
	let i = start;
	while (isBlank(script[i])) i++;
	return i;
}

function lineEnd(script: string, start: number): number {
	const end = script.indexOf('\n', start);
	return end === -1 ? script.length : end;
}

/** Index after the unescaped `delimiter` that closes a part starting at `start`. */
function skipDelimited(script: string, start: number, delimiter: string): number {
	for (let i = start; i < script.length; i++) {
		if (script[i] === '\\') {
			i++;
			continue;
		}
		if (script[i] === delimiter) return i + 1;
	}
	return script.length;
}

function skipDigits(script: string, start: number): number {
	let i = start;
	while (/[0-9~]/.test(script[i] ?? '')) i++;
	return i;
}

function skipOneAddress(script: string, start: number): number {
	const char = script[start];
	if (char === undefined) return start;
	if (/[0-9]/.test(char)) return skipDigits(script, start);
	if (char === '$') return start + 1;
	if (char === '+' || char === '~') return skipDigits(script, start + 1);

	let end: number;
	if (char === '/') {
		end = skipDelimited(script, start + 1, '/');
	} else if (char === '\\' && script[start + 1] !== undefined) {
		end = skipDelimited(script, start + 2, script[start + 1] ?? '');
	} else {
		return start;
	}
	while (script[end] === 'I' || script[end] === 'M') end++;
	return end;
}

function skipAddress(script: string, start: number): number {
	let i = skipOneAddress(script, start);
	if (i !== start) {
		i = skipBlanks(script, i);
		if (script[i] === ',') i = skipOneAddress(script, skipBlanks(script, i + 1));
	}
	i = skipBlanks(script, i);
	while (script[i] === '!') i = skipBlanks(script, i + 1);
	return i;
}

/** Index of the `;` or newline ending a label or similar argument. */
function argumentEnd(script: string, start: number): number {
	let i = start;
	while (i < script.length && script[i] !== ';' && script[i] !== '\n') i++;
	return i;
}

/**
 * Scans a sed program for the files its `r`, `R`, `w` and `W` commands and
 * `s///w` flag name, and for `e`, which runs shell commands.
 */
export function sedScriptEffects(script: string): ScriptEffects {
	const effects: ScriptEffects = { reads: [], writes: [], opaque: null };
	let i = 0;

	const fileArgument = (start: number): string => {
		const end = lineEnd(script, start);
		const name = script.slice(skipBlanks(script, start), end);
		i = end;
		return name;
	};
	const addWrite = (name: string) => {
		if (!SED_STREAM_FILES.has(name)) effects.writes.push(name);
	};

	while (i < script.length) {
		const char = script[i];
		if (char === undefined) break;
		if (/[\s;]/.test(char)) {
			i++;
			continue;
		}

		i = skipAddress(script, i);
		const command = script[i];
		if (command === undefined) break;
		i++;

		switch (command) {
			case '#':
				i = lineEnd(script, i);
				break;
			case ':':
			case 'b':
			case 't':
			case 'T':
			case 'v':
				i = argumentEnd(script, i);
				break;
			case 'a':
			case 'i':
			case 'c': {
				// Text runs to the end of the line, and on while lines end in a backslash.
				let end = lineEnd(script, i);
				while (script[end - 1] === '\\' && end < script.length) end = lineEnd(script, end + 1);
				i = end;
				break;
			}
			case 'r':
			case 'R':
				effects.reads.push(fileArgument(i));
				break;
			case 'w':
			case 'W':
				addWrite(fileArgument(i));
				break;
			case 'e':
				effects.opaque = 'sed e command runs shell commands';
				i = lineEnd(script, i);
				break;
			case 's': {
				const delimiter = script[i];
				if (delimiter === undefined) break;
				i = skipDelimited(script, skipDelimited(script, i + 1, delimiter), delimiter);
				while (i < script.length) {
					const flag = script[i];
					if (flag === 'w') {
						addWrite(fileArgument(i + 1));
						break;
					}
					if (flag === 'e') effects.opaque = 'sed s///e flag runs the pattern space as a command';
					if (flag === undefined || !/[gpiImMe0-9]/.test(flag)) break;
					i++;
				}
				break;
			}
			case 'y': {
				const delimiter = script[i];
				if (delimiter === undefined) break;
				i = skipDelimited(script, skipDelimited(script, i + 1, delimiter), delimiter);
				break;
			}
			case 'q':
			case 'Q':
			case 'l':
			case 'L':
				i = skipDigits(script, skipBlanks(script, i));
				break;
			default:
				break;
		}
	}

	return effects;
}

interface MaskedProgram {
	/** The program with string, regex and comment contents blanked out. */
	masked: string;
	/** String literal values keyed by the index of their opening quote. */
	literals: Map<number, string>;
}

// A `/` after one of these (or at the start) opens a regex, not a division.
const REGEX_PRECEDERS = new Set(['', '(', ',', '{', '}', ';', '!', '~', '&', '|', '\n', ':', '?']);

function maskAwkProgram(script: string): MaskedProgram {
	const literals = new Map<number, string>();
	let masked = '';
	let previous = '';

	for (let i = 0; i < script.length; i++) {
		const char = script[i] ?? '';

		if (char === '"') {
			let value = '';
			let j = i + 1;
			while (j < script.length && script[j] !== '"') {
				if (script[j] === '\\' && j + 1 < script.length) {
					const escaped = script[j + 1] ?? '';
					value += escaped === 'n' ? '\n' : escaped === 't' ? '\t' : escaped;
					j += 2;
					continue;
				}
				value += script[j];
				j++;
			}
			literals.set(i, value);
			masked += `"${' '.repeat(Math.max(0, Math.min(j, script.length) - i - 1))}"`;
			i = j;
			previous = '"';
			continue;
		}

		if (char === '/' && REGEX_PRECEDERS.has(previous)) {
			const end = skipDelimited(script, i + 1, '/');
			masked += `/${' '.repeat(Math.max(0, end - i - 2))}/`;
			i = end - 1;
			previous = '/';
			continue;
		}

		if (char === '#') {
			const end = lineEnd(script, i);
			masked += ' '.repeat(end - i);
			i = end - 1;
			continue;
		}

		masked += char;
		if (!/\s/.test(char) || char === '\n') previous = char;
	}

	return { masked, literals };
}

/**
 * Scans an awk program for `print > "file"`, `getline < "file"`, pipes and
 * `system()`. A redirection to anything but a string literal, a pipe, or
 * `system()` makes the program opaque.
 */
export function awkScriptEffects(script: string): ScriptEffects {
	const effects: ScriptEffects = { reads: [], writes: [], opaque: null };
	const { masked, literals } = maskAwkProgram(script);

	if (/\bsystem\s*\(/.test(masked)) {
		return { ...effects, opaque: 'awk system() runs shell commands' };
	}
	if (/(?<!\|)\|(?!\|)/.test(masked)) {
		return { ...effects, opaque: 'awk pipes run shell commands' };
	}

	for (const match of masked.matchAll(/\bgetline\b(?:\s+[A-Za-z_]\w*)?\s*<\s*/g)) {
		const literal = literals.get((match.index ?? 0) + match[0].length);
		if (literal === undefined) {
			return { ...effects, opaque: 'awk getline reads a file named at run time' };
		}
		effects.reads.push(literal);
	}

	for (const match of masked.matchAll(/\bprintf?\b/g)) {
		let depth = 0;
		for (let j = (match.index ?? 0) + match[0].length; j < masked.length; j++) {
			const char = masked[j];
			if (depth === 0 && (char === ';' || char === '}' || char === '\n')) break;
			if (char === '(') depth++;
			else if (char === ')') depth--;
			else if (char === '>' && depth === 0) {
				const start = skipBlanks(masked, masked[j + 1] === '>' ? j + 2 : j + 1);
				const literal = literals.get(start);
				if (literal === undefined) {
					return { ...effects, opaque: 'awk print redirects to a file named at run time' };
				}
				effects.writes.push(literal);
				break;
			}
		}
	}

	return effects;
}
