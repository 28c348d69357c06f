import { isWithin, resolvePathToken } from '../../sandbox/containment.js';
import { pathOperands, scriptEffects } from '../operands.js';
import { expandPatterns, locateInvocations, matchesAny, staticValue } from '../paths.js';
import { type ShellToken, redirectionTargetsFile } from '../shell-tokens.js';
import type { Classifier, ClassifierContext, ClassifierFinding } from '../types.js';

export interface ContainmentViolation {
	token: string;
	resolved: string | null;
	reason: string;
}

/**
 * Every path a command names (operands, option values, redirection targets,
 * `cd` arguments and files named inside sed and awk programs) must resolve
 * inside the sandbox root once `..` and symlinks are followed. Paths
 * matching `allowedExternalPaths` are exempt. Commands whose file effects
 * cannot be read off the text are rejected. Shared by the classifier and
 * the executor's pre-spawn check.
 */
export function findContainmentViolation(context: ClassifierContext): ContainmentViolation | null {
	const allowed = expandPatterns(context.allowedExternalPaths, context.homeDir);

	for (const { invocation, workingDirs } of locateInvocations(context)) {
		if (invocation.nestedTooDeep) {
			return {
				token: context.parsed.raw,
				resolved: null,
				reason: 'Command nests shells or substitutions too deeply to check',
			};
		}
		const opaque = scriptEffects(invocation)?.opaque;
		if (opaque) {
			return { token: invocation.name, resolved: null, reason: `${opaque} and cannot be checked` };
		}

		const tokens: ShellToken[] = [...pathOperands(invocation)];
		for (const redirection of invocation.segment.redirections) {
			if (redirection.target && redirectionTargetsFile(redirection)) {
				tokens.push(redirection.target);
			}
		}
		const changesDir = invocation.name === 'cd' || invocation.name === 'pushd';
		if (changesDir && tokens.length === 0 && !isWithin(context.sandboxRoot, context.homeDir)) {
			return {
				token: invocation.name,
				resolved: context.homeDir,
				reason: `${invocation.name} without an argument moves to ${context.homeDir}, outside the sandbox root`,
			};
		}

		for (const token of tokens) {
			const value = staticValue(token, context.homeDir);
			if (value === null) {
				return {
					token: token.value,
					resolved: null,
					reason: `"${token.value}" is expanded at run time and cannot be checked`,
				};
			}
			for (const dir of workingDirs) {
				const resolved = resolvePathToken(value, dir, context.homeDir);
				if (isWithin(context.sandboxRoot, resolved.real)) continue;
				if (matchesAny([resolved.lexical, resolved.real], allowed)) continue;
				return {
					token: token.value,
					resolved: resolved.real,
					reason: `Path "${token.value}" resolves to ${resolved.real}, outside the sandbox root`,
				};
			}
		}
	}

	return null;
}

export const pathContainmentClassifier: Classifier = {
	name: 'path-containment',
	evaluate(context): ClassifierFinding | null {
		const violation = findContainmentViolation(context);
		return violation ? { category: 'containment', reason: violation.reason } : null;
	},
};
