import path from 'node:path';
import { isWithin, resolvePathToken } from '../../sandbox/containment.js';
import { findStartOperands } from '../operands.js';
import { locateInvocations, staticValue } from '../paths.js';
import { type Invocation, type ShellToken, splitArguments } from '../shell-tokens.js';
import type { Classifier, ClassifierContext, ClassifierFinding } from '../types.js';

const BARE_GLOB_PATTERN = /^(?:[*?]+|\.\*|\.\[!.\]\*)$/;
const FIND_FILTERS = new Set(['-name', '-iname', '-path', '-ipath', '-wholename', '-regex', '-iregex']);

type TargetKind = 'root-like' | 'bare-glob' | 'dynamic' | null;

/**
 * Classifies a deletion target. A bare glob stands for everything in its
 * directory, so `./*` is judged by `.`.
 */
function classifyTarget(token: ShellToken, workingDirs: readonly string[], context: ClassifierContext): TargetKind {
	const value = staticValue(token, context.homeDir);
	if (value === null) return 'dynamic';

	const globbed = BARE_GLOB_PATTERN.test(path.basename(value)) && !token.quoted;
	const target = globbed ? path.dirname(value) : value;

	for (const dir of workingDirs) {
		const resolved = resolvePathToken(target, dir, context.homeDir).real;
		// The root itself or one of its ancestors.
		if (isWithin(resolved, context.sandboxRoot)) {
			return globbed ? 'bare-glob' : 'root-like';
		}
	}
	return null;
}

function describe(kind: Exclude<TargetKind, null>, token: ShellToken, verb: string): string {
	switch (kind) {
		case 'root-like':
			return `${verb} targets "${token.value}", which is the sandbox root or one of its ancestors`;
		case 'bare-glob':
			return `${verb} targets the unguarded wildcard "${token.value}" at the sandbox root`;
		case 'dynamic':
			return `${verb} targets "${token.value}", which is only known at run time`;
	}
}

function checkRm(
	invocation: Invocation,
	workingDirs: readonly string[],
	context: ClassifierContext,
): ClassifierFinding | null {
	const { shortFlags, longOptions, operands } = splitArguments(invocation.args);
	const recursive = shortFlags.has('r') || shortFlags.has('R') || longOptions.has('recursive');
	const verb = recursive ? 'Recursive delete' : 'Delete';

	for (const operand of operands) {
		const kind = classifyTarget(operand, workingDirs, context);
		if (kind === null) continue;
		// A plain `rm` of the root directory fails on its own; globs and unknowns do not.
		if (kind === 'root-like' && !recursive) continue;
		if (kind === 'dynamic' && !recursive) continue;
		return { category: 'destructive', reason: describe(kind, operand, verb) };
	}
	return null;
}

function checkFind(
	invocation: Invocation,
	workingDirs: readonly string[],
	context: ClassifierContext,
): ClassifierFinding | null {
	const values = invocation.args.map((arg) => arg.value);
	const deletes =
		values.includes('-delete') ||
		values.some(
			(value, index) =>
				(value === '-exec' || value === '-execdir') && /(?:^|\/)rm$/.test(values[index + 1] ?? ''),
		);
	if (!deletes) return null;
	if (values.some((value) => FIND_FILTERS.has(value))) return null;

	const starts = findStartOperands(invocation);
	const implicitStart: ShellToken = { value: '.', quoted: false, expands: false, operator: false };
	for (const start of starts.length > 0 ? starts : [implicitStart]) {
		const kind = classifyTarget(start, workingDirs, context);
		if (kind === 'root-like' || kind === 'dynamic') {
			return { category: 'destructive', reason: describe(kind, start, 'find with deletion') };
		}
	}
	return null;
}

/** Recursive deletes aimed at the sandbox root, its ancestors or everything in it. */
export const destructiveRootClassifier: Classifier = {
	name: 'destructive-root',
	evaluate(context) {
		for (const { invocation, workingDirs } of locateInvocations(context)) {
			if (invocation.name === 'rm') {
				const finding = checkRm(invocation, workingDirs, context);
				if (finding) return finding;
			} else if (invocation.name === 'find') {
				const finding = checkFind(invocation, workingDirs, context);
				if (finding) return finding;
			}
		}
		return null;
	},
};
