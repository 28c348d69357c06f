import path from 'node:path';

export interface ShellToken {
	/** Text after quote removal. */
	value: string;
	/** Some part of the token was quoted or escaped. */
	quoted: boolean;
	/** Contains `$` or a backtick outside single quotes, so its value is only known at run time. */
	expands: boolean;
	operator: boolean;
	/** Bodies of the `$(…)` and backtick substitutions inside the token. */
	substitutions?: readonly string[];
}

export interface Redirection {
	operator: string;
	target?: ShellToken;
}

export interface CommandSegment {
	words: ShellToken[];
	redirections: Redirection[];
}

export interface ParsedCommand {
	raw: string;
	tokens: ShellToken[];
	segments: CommandSegment[];
	unterminated: 'single-quote' | 'double-quote' | 'escape' | null;
	unbalancedParens: boolean;
	unbalancedBackticks: boolean;
	/** Operators with nothing on one side, e.g. `ls |` or `&& ls`. */
	danglingOperators: string[];
}

/** A segment with wrappers and environment assignments stripped off. */
export interface Invocation {
	name: string;
	args: ShellToken[];
	segment: CommandSegment;
	/** Set when a nested command sits deeper than the parser follows. */
	nestedTooDeep?: boolean;
}

export interface SplitArguments {
	/** Short option letters, e.g. `-rf` yields `r` and `f`. */
	shortFlags: Set<string>;
	longOptions: Map<string, string | undefined>;
	operands: ShellToken[];
}

const OPERATOR_PATTERN = /^(?:\|\||&&|;;|&>>|&>|>>|>\||>&|<<<|<<|<&|[|;&<>])/;
const FD_REDIRECT_PATTERN = /^\d+(?:>>|>&|>\||>|<&|<)/;
const SEGMENT_OPERATORS = new Set(['|', '||', '&&', ';', ';;', '&', '(', ')']);
const BINARY_OPERATORS = new Set(['|', '||', '&&']);
const REDIRECTION_PATTERN = /^(?:\d*(?:>>|>\||>&|>|<<<|<<|<&|<)|&>>?)$/;
const OUTPUT_REDIRECTION_PATTERN = /^(?:\d*(?:>>|>\||>)|&>>?)$/;
const WRAPPER_COMMANDS = new Set(['sudo', 'doas', 'command', 'builtin', 'exec', 'nohup', 'time', 'nice']);
const ENV_ASSIGNMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** Index of the backtick closing a substitution whose body starts at `start`, or -1. */
function scanBackticks(input: string, start: number): number {
	for (let i = start; i < input.length; i++) {
		const char = input[i];
		if (char === '\\') {
			i++;
			continue;
		}
		if (char === '`') return i;
	}
	return -1;
}

/** Index of the `"` closing a double-quoted string whose body starts at `start`, or -1. */
function scanDoubleQuoted(input: string, start: number): number {
	for (let i = start; i < input.length; i++) {
		const char = input[i];
		if (char === '\\') {
			i++;
		} else if (char === '"') {
			return i;
		} else if (char === '`') {
			i = scanBackticks(input, i + 1);
			if (i === -1) return -1;
		} else if (char === '$' && input[i + 1] === '(') {
			const end = scanSubstitution(input, i + 2);
			if (end === -1) return -1;
			i = end - 1;
		}
	}
	return -1;
}

/** Index just past the `)` closing a `$(` whose body starts at `start`, or -1. */
function scanSubstitution(input: string, start: number): number {
	let depth = 1;
	for (let i = start; i < input.length; i++) {
		const char = input[i];
		if (char === '\\') {
			i++;
		} else if (char === "'") {
			i = input.indexOf("'", i + 1);
			if (i === -1) return -1;
		} else if (char === '"') {
			i = scanDoubleQuoted(input, i + 1);
			if (i === -1) return -1;
		} else if (char === '`') {
			i = scanBackticks(input, i + 1);
			if (i === -1) return -1;
		} else if (char === '(') {
			depth++;
		} else if (char === ')') {
			depth--;
			if (depth === 0) return i + 1;
		}
	}
	return -1;
}

function tokenize(input: string) {
	const tokens: ShellToken[] = [];
	let groupDepth = 0;
	let parenUnderflow = false;
	let unclosedSubstitution = false;
	let unclosedBackticks = false;
	let current = '';
	let started = false;
	let quoted = false;
	let expands = false;
	let substitutions: string[] = [];
	let inSingle = false;
	let inDouble = false;
	let escaping = false;

	const flush = () => {
		if (started) {
			const token: ShellToken = { value: current, quoted, expands, operator: false };
			if (substitutions.length > 0) token.substitutions = substitutions;
			tokens.push(token);
		}
		current = '';
		started = false;
		quoted = false;
		expands = false;
		substitutions = [];
	};
	const pushOperator = (op: string) => {
		flush();
		tokens.push({ value: op, quoted: false, expands: false, operator: true });
	};

	/**
	 * Copies a `$(…)` or backtick substitution starting at `i` into the
	 * current word whole and records its body. Returns the index of its
	 * last character.
	 */
	const takeSubstitution = (i: number): number => {
		started = true;
		expands = true;
		const backtick = input[i] === '`';
		const close = backtick ? scanBackticks(input, i + 1) : scanSubstitution(input, i + 2);
		if (close === -1) {
			if (backtick) unclosedBackticks = true;
			else unclosedSubstitution = true;
			current += input.slice(i);
			return input.length - 1;
		}
		const end = backtick ? close + 1 : close;
		current += input.slice(i, end);
		substitutions.push(
			backtick ? input.slice(i + 1, close).replace(/\\([\\`$])/g, '$1') : input.slice(i + 2, close - 1),
		);
		return end - 1;
	};

	for (let i = 0; i < input.length; i++) {
		const char = input[i];
		if (char === undefined) continue;
		const next = input[i + 1];

		if (inSingle) {
			if (char === "'") {
				inSingle = false;
				continue;
			}
			current += char;
			continue;
		}

		if (inDouble) {
			if (escaping) {
				current += char;
				escaping = false;
				continue;
			}
			if (char === '\\') {
				escaping = true;
				continue;
			}
			if (char === '"') {
				inDouble = false;
				continue;
			}
			if (char === '`' || (char === '$' && next === '(')) {
				i = takeSubstitution(i);
				continue;
			}
			if (char === '$') expands = true;
			current += char;
			continue;
		}

		if (escaping) {
			current += char;
			escaping = false;
			continue;
		}

		if (char === '\\') {
			escaping = true;
			started = true;
			quoted = true;
			continue;
		}
		if (char === "'") {
			inSingle = true;
			started = true;
			quoted = true;
			continue;
		}
		if (char === '"') {
			inDouble = true;
			started = true;
			quoted = true;
			continue;
		}
		if (char === '`' || (char === '$' && next === '(')) {
			i = takeSubstitution(i);
			continue;
		}
		if (char === '$') {
			expands = true;
			started = true;
			current += char;
			continue;
		}
		if (char === '(') {
			groupDepth++;
			pushOperator('(');
			continue;
		}
		if (char === ')') {
			if (groupDepth === 0) parenUnderflow = true;
			else groupDepth--;
			pushOperator(')');
			continue;
		}
		if (char === '\n') {
			pushOperator(';');
			continue;
		}
		if (/\s/.test(char)) {
			flush();
			continue;
		}
		if (char === '#' && !started) {
			// Comment runs to end of line.
			const newline = input.indexOf('\n', i);
			if (newline === -1) break;
			i = newline - 1;
			continue;
		}

		const rest = input.slice(i);
		const fdMatch = !started ? rest.match(FD_REDIRECT_PATTERN) : null;
		const operatorMatch = fdMatch ?? rest.match(OPERATOR_PATTERN);
		if (operatorMatch?.[0]) {
			pushOperator(operatorMatch[0]);
			i += operatorMatch[0].length - 1;
			continue;
		}

		current += char;
		started = true;
	}

	const unterminated = inSingle
		? ('single-quote' as const)
		: inDouble
			? ('double-quote' as const)
			: escaping
				? ('escape' as const)
				: null;
	flush();

	return {
		tokens,
		unterminated,
		unbalancedParens: parenUnderflow || unclosedSubstitution || groupDepth > 0,
		unbalancedBackticks: unclosedBackticks,
	};
}

function isRedirectionOperator(op: string): boolean {
	return REDIRECTION_PATTERN.test(op);
}

export function isOutputRedirection(op: string): boolean {
	return OUTPUT_REDIRECTION_PATTERN.test(op);
}

/** `2>&1`, `>&2` and here-doc delimiters name descriptors or markers, not files. */
export function redirectionTargetsFile(redirection: Redirection): boolean {
	const { operator, target } = redirection;
	if (!target) return false;
	if (operator.startsWith('<<')) return false;
	if (operator.endsWith('&') && /^(?:\d+|-)$/.test(target.value)) return false;
	return true;
}

/**
 * Tokenizes a command line and splits it into simple-command segments on
 * pipes, lists and subshell parentheses. Never throws: malformed input is
 * reported through the flags on the result.
 */
export function parseCommand(raw: string): ParsedCommand {
	const { tokens, unterminated, unbalancedParens, unbalancedBackticks } = tokenize(raw);
	const segments: CommandSegment[] = [];
	const danglingOperators: string[] = [];
	let current: CommandSegment = { words: [], redirections: [] };

	const closeSegment = () => {
		if (current.words.length > 0 || current.redirections.length > 0) {
			segments.push(current);
		}
		current = { words: [], redirections: [] };
	};

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i];
		if (!token) continue;
		const previous = tokens[i - 1];
		const following = tokens[i + 1];

		if (!token.operator) {
			current.words.push(token);
			continue;
		}

		if (isRedirectionOperator(token.value)) {
			if (!following || following.operator) {
				danglingOperators.push(token.value);
				current.redirections.push({ operator: token.value });
				continue;
			}
			current.redirections.push({ operator: token.value, target: following });
			i++;
			continue;
		}

		if (SEGMENT_OPERATORS.has(token.value)) {
			if (BINARY_OPERATORS.has(token.value)) {
				const leftOk = previous !== undefined && (!previous.operator || previous.value === ')');
				const rightOk = following !== undefined && (!following.operator || following.value === '(');
				if (!leftOk || !rightOk) danglingOperators.push(token.value);
			} else if (token.value === ';' || token.value === ';;' || token.value === '&') {
				if (!previous || (previous.operator && previous.value !== ')')) {
					danglingOperators.push(token.value);
				}
			}
			closeSegment();
			continue;
		}

		// Any other operator is treated as a separator.
		closeSegment();
	}
	closeSegment();

	return {
		raw,
		tokens,
		segments,
		unterminated,
		unbalancedParens,
		unbalancedBackticks,
		danglingOperators,
	};
}

/**
 * Finds the program a segment actually runs, looking through `sudo`, `env`,
 * `nice` and leading `VAR=value` assignments.
 */
export function resolveInvocation(segment: CommandSegment): Invocation | null {
	const words = segment.words;
	let index = 0;

	while (index < words.length) {
		const word = words[index];
		if (!word) break;
		if (!word.quoted && ENV_ASSIGNMENT_PATTERN.test(word.value)) {
			index++;
			continue;
		}
		const name = path.basename(word.value);
		if (WRAPPER_COMMANDS.has(name)) {
			index++;
			// Skip the wrapper's own options (`sudo -u root`, `nice -n 5`).
			while (index < words.length && words[index]?.value.startsWith('-')) {
				const option = words[index]?.value ?? '';
				index++;
				if (/^-[unCgp]$/.test(option) && index < words.length) index++;
			}
			continue;
		}
		if (name === 'env') {
			index++;
			while (index < words.length) {
				const value = words[index]?.value ?? '';
				if (value.startsWith('-') || ENV_ASSIGNMENT_PATTERN.test(value)) {
					index++;
					continue;
				}
				break;
			}
			continue;
		}
		return { name, args: words.slice(index + 1), segment };
	}

	return null;
}

/**
 * Separates options from operands. Everything after `--` is an operand.
 * Options that take a separate value are not known here, so `-e pattern`
 * reports `pattern` as an operand; classifiers that care handle it.
 */
export function splitArguments(args: readonly ShellToken[]): SplitArguments {
	const shortFlags = new Set<string>();
	const longOptions = new Map<string, string | undefined>();
	const operands: ShellToken[] = [];
	let endOfOptions = false;

	for (const arg of args) {
		const value = arg.value;
		if (endOfOptions || value === '-' || !value.startsWith('-')) {
			operands.push(arg);
			continue;
		}
		if (value === '--') {
			endOfOptions = true;
			continue;
		}
		if (value.startsWith('--')) {
			const eq = value.indexOf('=');
			if (eq === -1) {
				longOptions.set(value.slice(2), undefined);
			} else {
				longOptions.set(value.slice(2, eq), value.slice(eq + 1));
			}
			continue;
		}
		for (const letter of value.slice(1)) {
			shortFlags.add(letter);
		}
	}

	return { shortFlags, longOptions, operands };
}

const SHELLS = new Set(['sh', 'bash', 'dash', 'zsh', 'ksh']);
const XARGS_VALUE_FLAGS = new Set(['-I', '-n', '-P', '-L', '-d', '-s', '-E', '-a']);
const FIND_EXEC_ACTIONS = new Set(['-exec', '-execdir', '-ok', '-okdir']);
const FIND_EXEC_TERMINATORS = new Set([';', '+']);
const NESTING_COMMANDS = new Set([...SHELLS, 'eval', 'xargs', 'find']);
const MAX_NESTING = 4;

/** The commands `find -exec … ;` runs, one per action. */
function findExecInvocations(args: readonly ShellToken[]): Invocation[] {
	const found: Invocation[] = [];
	for (let i = 0; i < args.length; i++) {
		if (!FIND_EXEC_ACTIONS.has(args[i]?.value ?? '')) continue;
		let end = i + 1;
		while (end < args.length && !FIND_EXEC_TERMINATORS.has(args[end]?.value ?? '')) end++;
		const inner = resolveInvocation({ words: args.slice(i + 1, end), redirections: [] });
		if (inner) found.push(inner);
		i = end;
	}
	return found;
}

function nestedInvocations(invocation: Invocation, depth: number): Invocation[] {
	const { name, args } = invocation;

	if (SHELLS.has(name)) {
		const flagIndex = args.findIndex((arg) => /^-[a-z]*c[a-z]*$/.test(arg.value));
		const script = flagIndex === -1 ? undefined : args[flagIndex + 1];
		return script ? invocations(parseCommand(script.value), depth + 1) : [];
	}

	if (name === 'eval') {
		return invocations(parseCommand(args.map((arg) => arg.value).join(' ')), depth + 1);
	}

	if (name === 'xargs') {
		let index = 0;
		while (index < args.length && args[index]?.value.startsWith('-')) {
			const option = args[index]?.value ?? '';
			index += XARGS_VALUE_FLAGS.has(option) ? 2 : 1;
		}
		const inner = resolveInvocation({ words: args.slice(index), redirections: [] });
		return inner ? withNested(inner, depth + 1) : [];
	}

	if (name === 'find') {
		return findExecInvocations(args).flatMap((inner) => withNested(inner, depth + 1));
	}

	return [];
}

function withNested(invocation: Invocation, depth: number): Invocation[] {
	if (depth >= MAX_NESTING) {
		if (!NESTING_COMMANDS.has(invocation.name)) return [invocation];
		return [invocation, { name: '', args: [], segment: invocation.segment, nestedTooDeep: true }];
	}
	return [invocation, ...nestedInvocations(invocation, depth)];
}

function segmentSubstitutions(segment: CommandSegment): string[] {
	const tokens = [
		...segment.words,
		...segment.redirections.flatMap((redirection) => (redirection.target ? [redirection.target] : [])),
	];
	return tokens.flatMap((token) => token.substitutions ?? []);
}

/**
 * Every program the command line runs, in order, including those behind
 * `sh -c`, `eval`, `xargs`, `find -exec` and command substitutions. A
 * substitution is listed before the command it feeds. A segment that runs
 * nothing (a bare redirection or assignment) appears with an empty name so
 * its redirections are still seen.
 */
export function invocations(parsed: ParsedCommand, depth = 0): Invocation[] {
	const result: Invocation[] = [];
	for (const segment of parsed.segments) {
		const invocation = resolveInvocation(segment) ?? { name: '', args: [], segment };
		const substitutions = segmentSubstitutions(segment);
		if (substitutions.length > 0 && depth >= MAX_NESTING) {
			result.push({ name: '', args: [], segment, nestedTooDeep: true });
		} else {
			for (const body of substitutions) {
				result.push(...invocations(parseCommand(body), depth + 1));
			}
		}
		result.push(...withNested(invocation, depth));
	}
	return result;
}
