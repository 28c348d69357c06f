import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import { parse as parseYaml } from 'yaml';
import { type FileAction, type FileActionResult, FileActionSchema } from '../actions/types.js';
import type { ExecutionResult, Result } from '../core/types.js';
import type { Expectation } from '../verify/expectations.js';
import { verifyAll } from '../verify/verifier.js';
import { formatVerdict } from './review.js';
import { loadExpectations } from './run.js';
import { type AppRuntime, errorMessage, type RuntimeOptions } from './runtime.js';

interface ApplyCommandOptions {
	config?: string;
	sandbox?: string;
	reviewOnly?: boolean;
	expectFile?: string;
	verbose?: boolean;
}

interface RegisterApplyCommandOptions {
	resolveRuntime(options: RuntimeOptions): AppRuntime;
}

/** Reads one file action from a YAML or JSON file. */
export function loadFileAction(filePath: string): Result<FileAction> {
	let raw: unknown;
	try {
		raw = parseYaml(readFileSync(filePath, 'utf-8'));
	} catch (err: unknown) {
		return { ok: false, error: new Error(`Failed to read file action from ${filePath}: ${errorMessage(err)}`) };
	}
	const parsed = FileActionSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
		return { ok: false, error: new Error(`Invalid file action in ${filePath}:\n${issues.join('\n')}`) };
	}
	return { ok: true, value: parsed.data };
}

/** Lets the verifier's stdout and exit-code expectations run against a file action. */
export function asExecutionResult(result: FileActionResult): ExecutionResult {
	return {
		proposalId: result.proposalId,
		exitCode: 0,
		stdout: result.content ?? '',
		stderr: '',
		durationMs: result.durationMs,
		timedOut: false,
		truncated: result.truncated,
	};
}

export function describeFileActionResult(result: FileActionResult): string {
	const lines = [`Applied: ${result.action}`];
	for (const change of result.changes) {
		lines.push(`  ${change.kind} ${change.path}${change.movedTo ? ` -> ${change.movedTo}` : ''}`);
	}
	if (result.bytesWritten > 0) lines.push(`Bytes written: ${result.bytesWritten}`);
	if (result.content !== undefined) {
		lines.push('--- content ---', result.content.trimEnd());
		if (result.truncated) lines.push('[content truncated]');
	}
	return lines.join('\n');
}

export function registerApplyCommand(program: Command, options: RegisterApplyCommandOptions): void {
	program
		.command('apply')
		.argument('<action-file>', 'YAML or JSON file holding a read-file, write-file or apply-patch action')
		.option('-c, --config <path>', 'Path to config file')
		.option('--sandbox <dir>', 'Existing sandbox root (default: a fresh temporary directory)')
		.option('--review-only', 'Stop after review; never touch the files')
		.option('--expect-file <path>', 'YAML or JSON list of expectations to verify')
		.option('-v, --verbose', 'Log to stderr')
		.description('Review a file action against the sandbox policy, apply it, and verify the result')
		.action(async (actionFile: string, commandOptions: ApplyCommandOptions) => {
			let runtime: AppRuntime | undefined;
			try {
				const loaded = loadFileAction(actionFile);
				if (!loaded.ok) throw loaded.error;
				let expectations: Expectation[] | undefined;
				if (commandOptions.expectFile) {
					const loadedExpectations = loadExpectations(commandOptions.expectFile);
					if (!loadedExpectations.ok) throw loadedExpectations.error;
					expectations = loadedExpectations.value;
				}

				runtime = options.resolveRuntime({ configPath: commandOptions.config, verbose: commandOptions.verbose });
				const session = await runtime.openSession({ sandboxRoot: commandOptions.sandbox });
				try {
					const { proposal, verdict } = runtime.engine.reviewFileAction(loaded.value, session.sandboxRoot);
					process.stdout.write(`Sandbox: ${session.sandboxRoot}\nAction: ${proposal.command}\n`);
					process.stdout.write(`${formatVerdict(verdict)}\n`);
					if (!verdict.approved) {
						process.exitCode = 1;
						return;
					}
					if (commandOptions.reviewOnly) return;

					const result = await runtime.createFileActionExecutor(session).apply(proposal, verdict, loaded.value);
					process.stdout.write(`${describeFileActionResult(result)}\n`);

					if (expectations) {
						const report = verifyAll(asExecutionResult(result), expectations, session.sandboxRoot);
						for (const outcome of report.outcomes) {
							process.stdout.write(`${outcome.passed ? 'ok  ' : 'FAIL'} ${outcome.expectation.type}: ${outcome.detail}\n`);
						}
						if (!report.passed) process.exitCode = 1;
					}
				} finally {
					await session.close();
				}
			} catch (error) {
				process.stderr.write(`Error: ${errorMessage(error)}\n`);
				process.exitCode = 1;
			} finally {
				runtime?.close();
			}
		});
}
