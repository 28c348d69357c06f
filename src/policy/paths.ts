import micromatch from 'micromatch';
import { expandHomeToken, resolvePathToken } from '../sandbox/containment.js';
import { type Invocation, type ShellToken, invocations, splitArguments } from './shell-tokens.js';
import type { ClassifierContext } from './types.js';

export interface LocatedInvocation {
	invocation: Invocation;
	/**
	 * Every directory the invocation might run in. Subshells and `||` make
	 * the effect of an earlier `cd` uncertain, so all candidates are kept.
	 */
	workingDirs: readonly string[];
}

export function locateInvocations(context: ClassifierContext): LocatedInvocation[] {
	const dirs: string[] = [context.workingDir ?? context.sandboxRoot];
	const located: LocatedInvocation[] = [];

	for (const invocation of invocations(context.parsed)) {
		located.push({ invocation, workingDirs: [...dirs] });
		if (invocation.name !== 'cd' && invocation.name !== 'pushd') continue;

		const target = splitArguments(invocation.args).operands[0];
		const value = target ? staticValue(target, context.homeDir) : context.homeDir;
		if (value === null) continue;
		for (const dir of [...dirs]) {
			const next = resolvePathToken(value, dir, context.homeDir).real;
			if (!dirs.includes(next)) dirs.push(next);
		}
	}

	return located;
}

/**
 * The token's value with `~` and `$HOME` expanded, or `null` when it still
 * depends on something only the running shell knows.
 */
export function staticValue(token: ShellToken, homeDir: string): string | null {
	const value = expandHomeToken(token.value, homeDir);
	if (token.expands && /[$`]/.test(value)) return null;
	return value;
}

export function expandPatterns(patterns: readonly string[], homeDir: string): string[] {
	return patterns.map((pattern) => expandHomeToken(pattern, homeDir));
}

export function matchesAny(candidates: readonly string[], patterns: readonly string[]): boolean {
	if (patterns.length === 0) return false;
	return candidates.some((candidate) => micromatch.isMatch(candidate, [...patterns], { dot: true }));
}
