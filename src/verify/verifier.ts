import { readFileSync, statSync } from 'node:fs';
import type { ExecutionResult, VerificationOutcome } from '../core/types.js';
import { resolveInsideRoot } from '../sandbox/containment.js';
import type { Expectation } from './expectations.js';

function outcome(expectation: Expectation, passed: boolean, detail: string): VerificationOutcome {
	return Object.freeze({ passed, detail, expectation });
}

class EscapedRootError extends Error {}

function locate(sandboxRoot: string, relative: string): string {
	const { path, inside } = resolveInsideRoot(sandboxRoot, relative);
	if (!inside) {
		throw new EscapedRootError(`${relative} resolves outside the sandbox root`);
	}
	return path;
}

function nonEmptyLines(text: string): string[] {
	return text.split('\n').filter((line) => line.trim() !== '');
}

function check(result: ExecutionResult, expectation: Expectation, sandboxRoot: string): VerificationOutcome {
	switch (expectation.type) {
		case 'file-content-equals': {
			const stats = statSync(locate(sandboxRoot, expectation.path), { throwIfNoEntry: false });
			if (!stats?.isFile()) {
				return outcome(expectation, false, `${expectation.path} does not exist`);
			}
			const actual = readFileSync(locate(sandboxRoot, expectation.path));
			const expected = Buffer.from(expectation.expected, 'utf-8');
			return actual.equals(expected)
				? outcome(expectation, true, `${expectation.path} has the expected content`)
				: outcome(
						expectation,
						false,
						`${expectation.path} content differs: expected ${JSON.stringify(expectation.expected)}, got ${JSON.stringify(actual.toString('utf-8'))}`,
					);
		}

		case 'file-exists': {
			const stats = statSync(locate(sandboxRoot, expectation.path), { throwIfNoEntry: false });
			if (!stats?.isFile()) {
				return outcome(expectation, false, `${expectation.path} is not a regular file`);
			}
			if (expectation.size !== undefined && stats.size !== expectation.size) {
				return outcome(
					expectation,
					false,
					`${expectation.path} is ${stats.size} bytes, expected ${expectation.size}`,
				);
			}
			return outcome(expectation, true, `${expectation.path} exists (${stats.size} bytes)`);
		}

		case 'file-absent': {
			const stats = statSync(locate(sandboxRoot, expectation.path), { throwIfNoEntry: false });
			return stats
				? outcome(expectation, false, `${expectation.path} still exists`)
				: outcome(expectation, true, `${expectation.path} is absent`);
		}

		case 'directory-exists': {
			const stats = statSync(locate(sandboxRoot, expectation.path), { throwIfNoEntry: false });
			return stats?.isDirectory()
				? outcome(expectation, true, `${expectation.path} is a directory`)
				: outcome(expectation, false, `${expectation.path} is not a directory`);
		}

		case 'output-contains': {
			const missing = expectation.substrings.filter((substring) => !result.stdout.includes(substring));
			return missing.length === 0
				? outcome(expectation, true, 'stdout contains every expected substring')
				: outcome(expectation, false, `stdout is missing ${missing.map((m) => JSON.stringify(m)).join(', ')}`);
		}

		case 'output-line-count': {
			const { pattern } = expectation;
			const lines = nonEmptyLines(result.stdout).filter((line) => pattern === undefined || line.includes(pattern));
			const subject = pattern === undefined ? 'non-empty lines' : `lines containing ${JSON.stringify(pattern)}`;
			return lines.length === expectation.count
				? outcome(expectation, true, `stdout has ${lines.length} ${subject}`)
				: outcome(expectation, false, `stdout has ${lines.length} ${subject}, expected ${expectation.count}`);
		}

		case 'files-equal': {
			const sourceStats = statSync(locate(sandboxRoot, expectation.source), { throwIfNoEntry: false });
			const copyStats = statSync(locate(sandboxRoot, expectation.copy), { throwIfNoEntry: false });
			if (!sourceStats?.isFile()) {
				return outcome(expectation, false, `${expectation.source} does not exist`);
			}
			if (!copyStats?.isFile()) {
				return outcome(expectation, false, `${expectation.copy} does not exist`);
			}
			const same = readFileSync(locate(sandboxRoot, expectation.source)).equals(
				readFileSync(locate(sandboxRoot, expectation.copy)),
			);
			return same
				? outcome(expectation, true, `${expectation.copy} matches ${expectation.source}`)
				: outcome(expectation, false, `${expectation.copy} differs from ${expectation.source}`);
		}

		case 'exit-code':
			return result.exitCode === expectation.code
				? outcome(expectation, true, `exit code ${result.exitCode}`)
				: outcome(expectation, false, `exit code ${result.exitCode}, expected ${expectation.code}`);
	}
}

/**
 * Checks one post-condition against the sandbox. Read-only. A timed-out
 * result fails without touching the filesystem, and a path escaping the
 * root fails rather than being read.
 */
export function verify(result: ExecutionResult, expectation: Expectation, sandboxRoot: string): VerificationOutcome {
	if (result.timedOut) {
		return outcome(expectation, false, 'command timed out; state not inspected');
	}
	try {
		return check(result, expectation, sandboxRoot);
	} catch (err: unknown) {
		if (err instanceof EscapedRootError) {
			return outcome(expectation, false, err.message);
		}
		throw err;
	}
}

export interface VerificationReport {
	passed: boolean;
	outcomes: VerificationOutcome[];
}

/** Passes iff every expectation passes. An empty list passes. */
export function verifyAll(
	result: ExecutionResult,
	expectations: readonly Expectation[],
	sandboxRoot: string,
): VerificationReport {
	const outcomes = expectations.map((expectation) => verify(result, expectation, sandboxRoot));
	return { passed: outcomes.every((entry) => entry.passed), outcomes };
}
