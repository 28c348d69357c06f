import type { Platform } from '../../config/schema.js';
import { isSedSuffixArgument } from '../operands.js';
import { type Invocation, invocations } from '../shell-tokens.js';
import type { Classifier } from '../types.js';

interface PortabilityRule {
	platform: Platform;
	command: string;
	/** Returns a reason when the invocation will not work on `platform`. */
	check(invocation: Invocation): string | null;
}

function values(invocation: Invocation): string[] {
	return invocation.args.map((arg) => arg.value);
}

function hasShortFlag(invocation: Invocation, letter: string): boolean {
	return values(invocation).some((value) => /^-[A-Za-z]+$/.test(value) && value.slice(1).includes(letter));
}

function hasLongOption(invocation: Invocation, name: string): boolean {
	return values(invocation).some((value) => value === `--${name}` || value.startsWith(`--${name}=`));
}

const RULES: readonly PortabilityRule[] = [
	{
		platform: 'bsd',
		command: 'sed',
		check(invocation) {
			if (hasLongOption(invocation, 'in-place')) {
				return 'BSD sed has no --in-place option; use -i with a suffix argument';
			}
			const args = invocation.args;
			const index = args.findIndex((arg) => arg.value === '-i');
			if (index !== -1 && !isSedSuffixArgument(args[index + 1])) {
				return "BSD sed -i requires a suffix argument (use -i '' for no backup)";
			}
			return null;
		},
	},
	{
		platform: 'bsd',
		command: 'grep',
		check: (invocation) =>
			hasShortFlag(invocation, 'P') || hasLongOption(invocation, 'perl-regexp')
				? 'BSD grep does not support Perl regular expressions (-P)'
				: null,
	},
	{
		platform: 'bsd',
		command: 'stat',
		check: (invocation) =>
			values(invocation).some((value) => value.startsWith('-c')) ||
			hasLongOption(invocation, 'format') ||
			hasLongOption(invocation, 'printf')
				? 'BSD stat uses -f for formats, not -c/--format'
				: null,
	},
	{
		platform: 'bsd',
		command: 'date',
		check: (invocation) =>
			values(invocation).some((value) => value.startsWith('-d')) || hasLongOption(invocation, 'date')
				? 'BSD date has no -d/--date; use -j -f or -v adjustments'
				: null,
	},
	...['ls', 'cp', 'mv'].map(
		(command): PortabilityRule => ({
			platform: 'bsd',
			command,
			check(invocation) {
				const long = values(invocation).find((value) => value.startsWith('--') && value !== '--');
				return long ? `BSD ${command} does not accept GNU long option ${long}` : null;
			},
		}),
	),
	{
		platform: 'bsd',
		command: 'find',
		check: (invocation) =>
			values(invocation).includes('-printf') ? 'BSD find has no -printf action' : null,
	},
	{
		platform: 'gnu',
		command: 'sed',
		check(invocation) {
			const args = invocation.args;
			const index = args.findIndex((arg) => arg.value === '-i');
			if (index !== -1 && isSedSuffixArgument(args[index + 1])) {
				return `GNU sed reads the separate suffix "${args[index + 1]?.value ?? ''}" after -i as the script; attach it (-i.bak) or drop it`;
			}
			return null;
		},
	},
	{
		platform: 'gnu',
		command: 'stat',
		check: (invocation) =>
			values(invocation).some((value) => value.startsWith('-f'))
				? 'GNU stat -f reports file system status; use -c for formats'
				: null,
	},
	{
		platform: 'gnu',
		command: 'date',
		check: (invocation) =>
			values(invocation).some((value) => value.startsWith('-v') || value === '-j')
				? 'GNU date has no -v or -j; use -d for date arithmetic'
				: null,
	},
];

export function portabilityRulesFor(platform: Platform): readonly PortabilityRule[] {
	return RULES.filter((rule) => rule.platform === platform);
}

/** Flags that exist on one userland but not the other. */
export const platformCompatClassifier: Classifier = {
	name: 'platform-compat',
	evaluate(context) {
		const rules = portabilityRulesFor(context.platform);
		for (const invocation of invocations(context.parsed)) {
			for (const rule of rules) {
				if (rule.command !== invocation.name) continue;
				const reason = rule.check(invocation);
				if (reason) return { category: 'portability', reason: `${reason} (target platform: ${context.platform})` };
			}
		}
		return null;
	},
};
