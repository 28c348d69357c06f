import { isWithin, resolvePathToken } from '../../sandbox/containment.js';
import { writeTargets } from '../operands.js';
import { expandPatterns, locateInvocations, matchesAny, staticValue } from '../paths.js';
import { type ShellToken, isOutputRedirection, redirectionTargetsFile } from '../shell-tokens.js';
import type { Classifier } from '../types.js';

const DISCARD_DEVICES = new Set(['/dev/null']);

/** Writes, appends, moves and permission changes aimed at protected locations. */
export const systemFileClassifier: Classifier = {
	name: 'system-file',
	evaluate(context) {
		const protectedPatterns = expandPatterns(context.protectedPaths, context.homeDir);

		for (const { invocation, workingDirs } of locateInvocations(context)) {
			const targets: Array<{ token: ShellToken; via: string }> = writeTargets(invocation).map((token) => ({
				token,
				via: invocation.name,
			}));
			for (const redirection of invocation.segment.redirections) {
				if (redirection.target && isOutputRedirection(redirection.operator) && redirectionTargetsFile(redirection)) {
					targets.push({ token: redirection.target, via: `Redirection ${redirection.operator}` });
				}
			}

			for (const { token: target, via } of targets) {
				const value = staticValue(target, context.homeDir);
				if (value === null) continue;
				for (const dir of workingDirs) {
					const resolved = resolvePathToken(value, dir, context.homeDir);
					if (isWithin(context.sandboxRoot, resolved.real)) continue;
					if (DISCARD_DEVICES.has(resolved.lexical)) continue;
					if (matchesAny([resolved.lexical, resolved.real], protectedPatterns)) {
						return {
							category: 'system-file',
							reason: `${via} would modify protected system file ${resolved.lexical}`,
						};
					}
				}
			}
		}
		return null;
	},
};
