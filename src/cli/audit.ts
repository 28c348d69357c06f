import type { Command } from 'commander';
import { z } from 'zod';
import type { AuditEntry, AuditFilters } from '../sandbox/types.js';
import { type AppRuntime, errorMessage, integerOption, type RuntimeOptions } from './runtime.js';

interface AuditCommandOptions {
	config?: string;
	limit: number;
	stage?: string;
	decision?: string;
	session?: string;
}

interface RegisterAuditCommandOptions {
	resolveRuntime(options: RuntimeOptions): AppRuntime;
}

const StageSchema = z.enum(['review', 'execute', 'verify']);
const DecisionSchema = z.enum(['approved', 'rejected', 'violation', 'denied', 'error']);

export function formatAuditEntry(entry: AuditEntry): string {
	const detail = entry.detail ? ` | ${entry.detail}` : '';
	return `${entry.timestamp.toISOString()} ${entry.stage.padEnd(7)} ${entry.decision.padEnd(9)} ${entry.result.padEnd(8)} ${entry.command}${detail}`;
}

export function registerAuditCommand(program: Command, options: RegisterAuditCommandOptions): void {
	program
		.command('audit')
		.option('-c, --config <path>', 'Path to config file')
		.option('-n, --limit <n>', 'Number of entries', integerOption(1), 20)
		.option('--stage <stage>', 'review|execute|verify')
		.option('--decision <decision>', 'approved|rejected|violation|denied|error')
		.option('--session <id>', 'Only entries from this session')
		.description('Show recent audit log entries')
		.action((commandOptions: AuditCommandOptions) => {
			let runtime: AppRuntime | undefined;
			try {
				runtime = options.resolveRuntime({ configPath: commandOptions.config });
				const filters: AuditFilters = {
					stage: commandOptions.stage === undefined ? undefined : StageSchema.parse(commandOptions.stage),
					decision:
						commandOptions.decision === undefined ? undefined : DecisionSchema.parse(commandOptions.decision),
					sessionId: commandOptions.session,
				};
				const filtered = filters.stage || filters.decision || filters.sessionId;
				const entries = filtered
					? runtime.audit.query(filters).slice(0, commandOptions.limit)
					: runtime.audit.getRecent(commandOptions.limit);

				if (entries.length === 0) {
					process.stdout.write('(no audit entries)\n');
					return;
				}
				for (const entry of entries) {
					process.stdout.write(`${formatAuditEntry(entry)}\n`);
				}
			} catch (error) {
				process.stderr.write(`Error: ${errorMessage(error)}\n`);
				process.exitCode = 1;
			} finally {
				runtime?.close();
			}
		});
}
