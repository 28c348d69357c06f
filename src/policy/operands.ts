import { awkScriptEffects, type ScriptEffects, sedScriptEffects } from './scripts.js';
import { type Invocation, type ShellToken, splitArguments } from './shell-tokens.js';

/** Commands whose operands are data, never file names. */
const DATA_ONLY_COMMANDS = new Set([
	'',
	'echo',
	'printf',
	'true',
	'false',
	':',
	'expr',
	'seq',
	'sleep',
	'yes',
	'export',
	'unset',
	'read',
	'alias',
]);

interface ScriptCommandRules {
	/** Options whose value is the script or pattern. */
	scriptOptions: ReadonlySet<string>;
	/** Options whose value is a file holding the script. */
	scriptFileOptions: ReadonlySet<string>;
	/** Options that swallow the next argument as an opaque value. */
	valueOptions: ReadonlySet<string>;
}

const SCRIPT_COMMANDS: Record<string, ScriptCommandRules> = {
	grep: {
		scriptOptions: new Set(['-e', '--regexp']),
		scriptFileOptions: new Set(['-f', '--file']),
		valueOptions: new Set(['-A', '-B', '-C', '-m', '--max-count']),
	},
	sed: {
		scriptOptions: new Set(['-e', '--expression']),
		scriptFileOptions: new Set(['-f', '--file']),
		valueOptions: new Set(['-l']),
	},
	awk: {
		scriptOptions: new Set<string>(),
		scriptFileOptions: new Set(['-f']),
		valueOptions: new Set(['-v', '-F']),
	},
};

const SCRIPT_COMMAND_ALIASES: Record<string, string> = {
	egrep: 'grep',
	fgrep: 'grep',
	gawk: 'awk',
	nawk: 'awk',
	mawk: 'awk',
};

/** A separate BSD in-place suffix such as `''` or `.bak`. */
export function isSedSuffixArgument(token: ShellToken | undefined): boolean {
	if (!token) return false;
	return token.value === '' || /^\.[\w.-]*$/.test(token.value);
}

function valueToken(arg: ShellToken, value: string): ShellToken {
	return { ...arg, value };
}

interface ScriptCommandArguments {
	/** `grep`, `sed` or `awk`, aliases folded. */
	command: string;
	files: ShellToken[];
	/** Patterns or programs given inline. */
	scripts: ShellToken[];
	scriptFiles: ShellToken[];
	inPlace: boolean;
}

/**
 * Splits a grep, sed or awk invocation into its file operands. The first
 * operand is the pattern or script unless one was given by option.
 */
function scriptCommandArguments(invocation: Invocation): ScriptCommandArguments | null {
	const key = SCRIPT_COMMAND_ALIASES[invocation.name] ?? invocation.name;
	const rules = SCRIPT_COMMANDS[key];
	if (!rules) return null;

	const { args } = invocation;
	const files: ShellToken[] = [];
	const scripts: ShellToken[] = [];
	const scriptFiles: ShellToken[] = [];
	let scriptGiven = false;
	let inPlace = false;
	let endOfOptions = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (!arg) continue;
		const value = arg.value;

		if (endOfOptions || value === '-' || !value.startsWith('-')) {
			if (!scriptGiven) {
				scriptGiven = true;
				scripts.push(arg);
				continue;
			}
			files.push(arg);
			continue;
		}
		if (value === '--') {
			endOfOptions = true;
			continue;
		}

		if (value.startsWith('--')) {
			const eq = value.indexOf('=');
			const option = eq === -1 ? value : value.slice(0, eq);
			const inline = eq === -1 ? undefined : value.slice(eq + 1);
			if (option === '--in-place') {
				inPlace = true;
				continue;
			}
			if (rules.scriptOptions.has(option)) {
				scriptGiven = true;
				const script = inline === undefined ? args[++i] : valueToken(arg, inline);
				if (script) scripts.push(script);
				continue;
			}
			if (rules.scriptFileOptions.has(option)) {
				scriptGiven = true;
				const file = inline === undefined ? args[++i] : valueToken(arg, inline);
				if (file) scriptFiles.push(file);
				continue;
			}
			if (rules.valueOptions.has(option) && inline === undefined) i++;
			continue;
		}

		if (key === 'sed' && value.startsWith('-i')) {
			inPlace = true;
			if (value === '-i' && isSedSuffixArgument(args[i + 1])) i++;
			continue;
		}
		if (rules.scriptOptions.has(value)) {
			scriptGiven = true;
			const script = args[++i];
			if (script) scripts.push(script);
			continue;
		}
		if (rules.scriptFileOptions.has(value)) {
			scriptGiven = true;
			const file = args[++i];
			if (file) scriptFiles.push(file);
			continue;
		}
		if (rules.valueOptions.has(value)) {
			i++;
			continue;
		}
		// Attached value, e.g. `-e's/a/b/'` or `-fscript.sed`.
		const letter = value.slice(0, 2);
		if (rules.scriptOptions.has(letter)) {
			scriptGiven = true;
			scripts.push(valueToken(arg, value.slice(2)));
		} else if (rules.scriptFileOptions.has(letter)) {
			scriptGiven = true;
			scriptFiles.push(valueToken(arg, value.slice(2)));
		}
	}

	return { command: key, files, scripts, scriptFiles, inPlace };
}

const SCRIPT_SCANNERS: Record<string, (script: string) => ScriptEffects> = {
	sed: sedScriptEffects,
	awk: awkScriptEffects,
};

/**
 * What a sed or awk program reads, writes or runs besides its operands;
 * `null` for other commands. Programs read from a file or built at run
 * time are opaque.
 */
export function scriptEffects(invocation: Invocation): ScriptEffects | null {
	const script = scriptCommandArguments(invocation);
	const scan = script ? SCRIPT_SCANNERS[script.command] : undefined;
	if (!script || !scan) return null;

	const effects: ScriptEffects = { reads: [], writes: [], opaque: null };
	if (script.scriptFiles.length > 0) {
		return { ...effects, opaque: `${script.command} program file contents are not inspected` };
	}
	for (const token of script.scripts) {
		if (token.expands && /[$`]/.test(token.value)) {
			return { ...effects, opaque: `${script.command} program is built at run time` };
		}
		const found = scan(token.value);
		if (found.opaque) return found;
		effects.reads.push(...found.reads);
		effects.writes.push(...found.writes);
	}
	return effects;
}

function pathToken(value: string): ShellToken {
	return { value, quoted: true, expands: false, operator: false };
}

/** Operands of a `find` invocation that name where the walk starts. */
export function findStartOperands(invocation: Invocation): ShellToken[] {
	const starts: ShellToken[] = [];
	for (const arg of invocation.args) {
		const value = arg.value;
		if (/^-[HLP]$/.test(value)) continue;
		if (value.startsWith('-') || value === '(' || value === '!') break;
		starts.push(arg);
	}
	return starts;
}

const FIND_OUTPUT_ACTIONS = new Set(['-fprint', '-fprint0', '-fprintf', '-fls']);

/** Files `find` writes through `-fprint`, `-fprint0`, `-fprintf` and `-fls`. */
function findOutputFiles(invocation: Invocation): ShellToken[] {
	const outputs: ShellToken[] = [];
	const { args } = invocation;
	for (let i = 0; i < args.length; i++) {
		const file = args[i + 1];
		if (FIND_OUTPUT_ACTIONS.has(args[i]?.value ?? '') && file) outputs.push(file);
	}
	return outputs;
}

const FILE_TESTS = new Set('bcdefgGhkLNOprsSuwx'.split('').map((letter) => `-${letter}`));
const FILE_COMPARISONS = new Set(['-nt', '-ot', '-ef']);

/** The file operands of a `test` or `[` expression. */
function testPathOperands(args: readonly ShellToken[]): ShellToken[] {
	const operands: ShellToken[] = [];
	for (let i = 0; i < args.length; i++) {
		const value = args[i]?.value ?? '';
		const following = args[i + 1];
		if (FILE_TESTS.has(value) && following) operands.push(following);
		if (FILE_COMPARISONS.has(value)) {
			const preceding = args[i - 1];
			if (preceding) operands.push(preceding);
			if (following) operands.push(following);
		}
	}
	return operands;
}

/** Short options known to take a file or directory, per command. */
const PATH_VALUE_OPTIONS: Record<string, string> = {
	sort: 'oT',
	cp: 't',
	mv: 't',
	install: 't',
	ln: 't',
	tar: 'CfT',
	patch: 'iod',
};

/**
 * The value glued to a short option cluster, as in `-o../out` or
 * `-xzf/tmp/a.tar`. Unknown options count when the rest looks like a path.
 */
function attachedPathValue(command: string, option: string): string | null {
	const letters = option.slice(1);
	const known = PATH_VALUE_OPTIONS[command] ?? '';
	for (let i = 0; i < letters.length; i++) {
		if (known.includes(letters.charAt(i))) {
			const rest = letters.slice(i + 1);
			return rest === '' ? null : rest;
		}
	}
	const rest = letters.slice(1);
	return rest.length > 1 && /^[.~]|\//.test(rest) ? rest : null;
}

/**
 * Values of the options named by `letters` and `longNames`, whether
 * attached (`-ofile`, `--output=file`) or separate (`-o file`).
 */
function optionValues(args: readonly ShellToken[], letters: string, longNames: readonly string[]): ShellToken[] {
	const found: ShellToken[] = [];
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (!arg || arg.value === '--') break;
		const value = arg.value;
		if (value.startsWith('--')) {
			const eq = value.indexOf('=');
			const name = value.slice(2, eq === -1 ? undefined : eq);
			if (!longNames.includes(name)) continue;
			const next = args[i + 1];
			if (eq !== -1) found.push(valueToken(arg, value.slice(eq + 1)));
			else if (next) found.push(next);
			continue;
		}
		if (!value.startsWith('-') || value === '-') continue;
		for (let j = 1; j < value.length; j++) {
			if (!letters.includes(value.charAt(j))) continue;
			const rest = value.slice(j + 1);
			const next = args[i + 1];
			if (rest !== '') found.push(valueToken(arg, rest));
			else if (next) found.push(next);
			break;
		}
	}
	return found;
}

/**
 * Operands that name files or directories, for containment checks.
 * Long option values (`--target-directory=dir`) and values glued to short
 * options (`-o../out`) count as operands.
 */
export function pathOperands(invocation: Invocation): ShellToken[] {
	if (DATA_ONLY_COMMANDS.has(invocation.name)) return [];
	if (invocation.name === 'test' || invocation.name === '[') return testPathOperands(invocation.args);

	const script = scriptCommandArguments(invocation);
	if (script) {
		const effects = scriptEffects(invocation);
		return [
			...script.scriptFiles,
			...script.files,
			...(effects?.reads ?? []).map(pathToken),
			...(effects?.writes ?? []).map(pathToken),
		];
	}

	if (invocation.name === 'find') return [...findStartOperands(invocation), ...findOutputFiles(invocation)];

	const operands: ShellToken[] = [];
	let endOfOptions = false;
	for (const arg of invocation.args) {
		const value = arg.value;
		if (!endOfOptions && value === '--') {
			endOfOptions = true;
			continue;
		}
		if (!endOfOptions && value.startsWith('--')) {
			const eq = value.indexOf('=');
			if (eq !== -1) operands.push(valueToken(arg, value.slice(eq + 1)));
			continue;
		}
		if (!endOfOptions && value.startsWith('-') && value !== '-') {
			const attached = attachedPathValue(invocation.name, value);
			if (attached !== null) operands.push(valueToken(arg, attached));
			continue;
		}
		if (invocation.name === 'dd') {
			const eq = value.indexOf('=');
			if (eq !== -1) operands.push(valueToken(arg, value.slice(eq + 1)));
			continue;
		}
		operands.push(arg);
	}
	return operands;
}

const MUTATES_EVERY_OPERAND = new Set(['touch', 'rm', 'rmdir', 'truncate', 'mkdir', 'tee', 'shred', 'unlink']);
const MUTATES_AFTER_FIRST = new Set(['chmod', 'chown', 'chgrp']);
const MUTATES_DESTINATION = new Set(['cp', 'mv', 'install', 'ln', 'rsync']);
const TAKES_TARGET_DIRECTORY = new Set(['cp', 'mv', 'install', 'ln']);

/**
 * `tar` writes its archive (`-f`) when creating and the directory it
 * changes to (`-C`) when extracting. The mode may be a dashless first word.
 */
function tarWriteTargets(invocation: Invocation): ShellToken[] {
	const { args } = invocation;
	const first = args[0]?.value ?? '';
	const modes = args
		.filter((arg) => /^-[A-Za-z]/.test(arg.value))
		.map((arg) => arg.value.slice(1))
		.concat(first.startsWith('-') ? [] : [first])
		.join('');
	const longs = new Set(args.map((arg) => arg.value));
	const targets: ShellToken[] = [];
	if (/[x]/.test(modes) || longs.has('--extract') || longs.has('--get')) {
		targets.push(...optionValues(args, 'C', ['directory']));
	}
	if (/[cru]/.test(modes) || longs.has('--create') || longs.has('--append') || longs.has('--update')) {
		targets.push(...optionValues(args, 'f', ['file']));
	}
	return targets;
}

/** Files an invocation writes to, leaving redirections aside. */
export function writeTargets(invocation: Invocation): ShellToken[] {
	const { name } = invocation;

	const script = scriptCommandArguments(invocation);
	if (script) {
		const written = (scriptEffects(invocation)?.writes ?? []).map(pathToken);
		return script.inPlace ? [...script.files, ...written] : written;
	}

	if (name === 'find') return findOutputFiles(invocation);
	if (name === 'sort') return optionValues(invocation.args, 'o', ['output']);
	if (name === 'tar') return tarWriteTargets(invocation);

	if (name === 'dd') {
		return invocation.args
			.filter((arg) => arg.value.startsWith('of='))
			.map((arg) => valueToken(arg, arg.value.slice(3)));
	}

	const { operands, longOptions } = splitArguments(invocation.args);

	if (MUTATES_EVERY_OPERAND.has(name)) return operands;
	if (MUTATES_AFTER_FIRST.has(name)) {
		return longOptions.has('reference') ? operands : operands.slice(1);
	}
	if (MUTATES_DESTINATION.has(name)) {
		const targetDirectory = TAKES_TARGET_DIRECTORY.has(name)
			? optionValues(invocation.args, 't', ['target-directory'])
			: [];
		if (targetDirectory.length > 0) return targetDirectory;
		const last = operands.at(-1);
		return last && operands.length > 1 ? [last] : [];
	}

	return [];
}
