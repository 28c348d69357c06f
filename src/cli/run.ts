import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import { parse as parseYaml } from 'yaml';
import type { Result, TaskRecord } from '../core/types.js';
import { type Expectation, ExpectationListSchema } from '../verify/expectations.js';
import { type AppRuntime, errorMessage, integerOption, type RuntimeOptions } from './runtime.js';

interface RunCommandOptions {
	config?: string;
	reviewOnly?: boolean;
	sandbox?: string;
	expectFile?: string;
	maxRevisions?: number;
	verbose?: boolean;
}

interface RegisterRunCommandOptions {
	resolveRuntime(options: RuntimeOptions): AppRuntime;
}

/** Reads a YAML or JSON list of expectations. */
export function loadExpectations(filePath: string): Result<Expectation[]> {
	let raw: unknown;
	try {
		raw = parseYaml(readFileSync(filePath, 'utf-8'));
	} catch (err: unknown) {
		return { ok: false, error: new Error(`Failed to read expectations from ${filePath}: ${errorMessage(err)}`) };
	}
	const parsed = ExpectationListSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
		return { ok: false, error: new Error(`Invalid expectations in ${filePath}:\n${issues.join('\n')}`) };
	}
	return { ok: true, value: parsed.data };
}

export function describeRecord(record: TaskRecord): string {
	const lines = [`State: ${record.state} (${record.history.join(' -> ')})`];
	if (record.proposal) lines.push(`Command: ${record.proposal.command}`);
	if (record.verdict) {
		lines.push(
			record.verdict.approved
				? `Verdict: approved${record.verdict.reasoning ? ` (${record.verdict.reasoning})` : ''}`
				: `Verdict: rejected [${record.verdict.category}/${record.verdict.classifier}] ${record.verdict.reasoning}`,
		);
	}
	if (record.execution) {
		lines.push(`Exit code: ${record.execution.exitCode}${record.execution.timedOut ? ' (timed out)' : ''}`);
		if (record.execution.stdout) lines.push('--- stdout ---', record.execution.stdout.trimEnd());
		if (record.execution.stderr) lines.push('--- stderr ---', record.execution.stderr.trimEnd());
	}
	for (const outcome of record.verifications ?? []) {
		lines.push(`${outcome.passed ? 'ok  ' : 'FAIL'} ${outcome.expectation.type}: ${outcome.detail}`);
	}
	if (record.failure) lines.push(`Failure: ${record.failure.message}`);
	return lines.join('\n');
}

export function registerRunCommand(program: Command, options: RegisterRunCommandOptions): void {
	program
		.command('run')
		.argument('<task>', 'Natural-language task')
		.option('-c, --config <path>', 'Path to config file')
		.option('--review-only', 'Stop after review; never execute')
		.option('--sandbox <dir>', 'Existing sandbox root (default: a fresh temporary directory)')
		.option('--expect-file <path>', 'YAML or JSON list of expectations to verify')
		.option('--max-revisions <n>', 'Revisions after a rejection or failed verification', integerOption(0))
		.option('-v, --verbose', 'Log to stderr')
		.description('Propose, review, execute and verify a command for a task')
		.action(async (task: string, commandOptions: RunCommandOptions) => {
			let runtime: AppRuntime | undefined;
			try {
				let expectations: Expectation[] | undefined;
				if (commandOptions.expectFile) {
					const loaded = loadExpectations(commandOptions.expectFile);
					if (!loaded.ok) throw loaded.error;
					expectations = loaded.value;
				}

				runtime = options.resolveRuntime({ configPath: commandOptions.config, verbose: commandOptions.verbose });
				const session = await runtime.openSession({ sandboxRoot: commandOptions.sandbox });
				try {
					const orchestrator = runtime.createOrchestrator(session, undefined, commandOptions.maxRevisions);
					const { final, attempts } = await orchestrator.runWithRevisions(task, {
						reviewOnly: commandOptions.reviewOnly,
						expectations,
					});
					process.stdout.write(`Session: ${session.id}\nSandbox: ${session.sandboxRoot}\n`);
					if (attempts.length > 1) process.stdout.write(`Attempts: ${attempts.length}\n`);
					process.stdout.write(`${describeRecord(final)}\n`);

					const succeeded = final.state === 'verified' || (commandOptions.reviewOnly && final.state === 'reviewed');
					if (!succeeded) process.exitCode = 1;
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
