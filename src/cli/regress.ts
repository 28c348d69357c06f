import { tmpdir } from 'node:os';
import type { Command } from 'commander';
import { createScriptedProposer } from '../agents/scripted.js';
import { PlatformSchema } from '../config/schema.js';
import { runBattery } from '../harness/harness.js';
import { formatReport } from '../harness/report.js';
import { builtInBattery, referenceScript } from '../harness/scenarios.js';
import { type AppRuntime, errorMessage, integerOption, type RuntimeOptions } from './runtime.js';

interface RegressCommandOptions {
	config?: string;
	offline?: boolean;
	concurrency?: number;
	platform?: string;
}

interface RegisterRegressCommandOptions {
	resolveRuntime(options: RuntimeOptions): AppRuntime;
}

export function registerRegressCommand(program: Command, options: RegisterRegressCommandOptions): void {
	program
		.command('regress')
		.option('-c, --config <path>', 'Path to config file')
		.option('--offline', 'Use the reference commands instead of the LLM proposer')
		.option('--concurrency <n>', 'Cases to run in parallel', integerOption(1))
		.option('--platform <platform>', 'bsd|gnu (default: configured or detected)')
		.description('Run the built-in regression battery against the safety gate and executor')
		.action(async (commandOptions: RegressCommandOptions) => {
			let runtime: AppRuntime | undefined;
			try {
				const platform =
					commandOptions.platform === undefined ? undefined : PlatformSchema.parse(commandOptions.platform);
				const app = options.resolveRuntime({ configPath: commandOptions.config, platform });
				runtime = app;

				const cases = builtInBattery(app.platform);
				const proposer = commandOptions.offline
					? createScriptedProposer(referenceScript(cases, app.platform))
					: app.proposer;

				const report = await runBattery(cases, {
					platform: app.platform,
					concurrency: commandOptions.concurrency ?? app.config.harness.concurrency,
					// Every case needs its own fresh root, even when one is configured.
					createSession: (sessionOptions) =>
						app.openSession({ ...sessionOptions, baseDir: sessionOptions.baseDir ?? tmpdir() }),
					createOrchestrator: (session) => app.createOrchestrator(session, proposer),
				});

				process.stdout.write(`Platform: ${app.platform}${commandOptions.offline ? ' (offline)' : ''}\n`);
				process.stdout.write(`${formatReport(report)}\n`);
				process.exitCode = report.exitCode;
			} catch (error) {
				process.stderr.write(`Error: ${errorMessage(error)}\n`);
				process.exitCode = 1;
			} finally {
				runtime?.close();
			}
		});
}
