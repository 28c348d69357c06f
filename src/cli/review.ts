import { resolve } from 'node:path';
import type { Command } from 'commander';
import { PlatformSchema } from '../config/schema.js';
import { expandHome } from '../config/defaults.js';
import { createProposal } from '../core/model.js';
import type { ReviewVerdict } from '../core/types.js';
import { type AppRuntime, errorMessage, type RuntimeOptions } from './runtime.js';

interface ReviewCommandOptions {
	config?: string;
	sandbox?: string;
	platform?: string;
}

interface RegisterReviewCommandOptions {
	resolveRuntime(options: RuntimeOptions): AppRuntime;
}

export function formatVerdict(verdict: ReviewVerdict): string {
	if (verdict.approved) {
		return `APPROVED${verdict.reasoning ? `: ${verdict.reasoning}` : ''}`;
	}
	return `REJECTED [${verdict.category}] ${verdict.classifier}: ${verdict.reasoning}`;
}

export function registerReviewCommand(program: Command, options: RegisterReviewCommandOptions): void {
	program
		.command('review')
		.argument('<command>', 'Shell command to review')
		.option('-c, --config <path>', 'Path to config file')
		.option('--sandbox <dir>', 'Sandbox root to judge paths against (default: configured root or cwd)')
		.option('--platform <platform>', 'bsd|gnu (default: configured or detected)')
		.description('Run the rule-based safety gate on a command without executing it')
		.action((command: string, commandOptions: ReviewCommandOptions) => {
			let runtime: AppRuntime | undefined;
			try {
				const platform =
					commandOptions.platform === undefined ? undefined : PlatformSchema.parse(commandOptions.platform);
				runtime = options.resolveRuntime({ configPath: commandOptions.config, platform });
				const root = resolve(
					commandOptions.sandbox ??
						(runtime.config.sandbox.root ? expandHome(runtime.config.sandbox.root) : process.cwd()),
				);

				const verdict = runtime.engine.review(createProposal(command), root);
				process.stdout.write(`${formatVerdict(verdict)}\n`);
				if (!verdict.approved) process.exitCode = 1;
			} catch (error) {
				process.stderr.write(`Error: ${errorMessage(error)}\n`);
				process.exitCode = 1;
			} finally {
				runtime?.close();
			}
		});
}
