import type { Orchestrator } from '../core/orchestrator.js';
import type { Session, SessionOptions } from '../core/session.js';
import type { Platform } from '../config/schema.js';
import type { TaskRecord } from '../core/types.js';
import { createLogger } from '../utils/logger.js';
import { commandFor, type ScenarioCase, type ScenarioKind } from './scenarios.js';

const logger = createLogger('harness');

export interface CaseResult {
	readonly name: string;
	readonly kind: ScenarioKind;
	readonly passed: boolean;
	readonly detail: string;
	readonly durationMs: number;
}

export interface HarnessReport {
	readonly rows: readonly CaseResult[];
	readonly passed: boolean;
	readonly exitCode: 0 | 1;
}

export interface HarnessDeps {
	createSession(options: SessionOptions): Promise<Session>;
	createOrchestrator(session: Session): Orchestrator;
	platform: Platform;
	/** Parent directory for the per-case roots; the OS temp dir by default. */
	baseDir?: string;
	concurrency?: number;
}

function judgePositive(record: TaskRecord): { passed: boolean; detail: string } {
	if (record.state === 'verified') {
		return { passed: true, detail: `verified: ${record.proposal?.command ?? ''}` };
	}
	if (record.verdict && !record.verdict.approved) {
		return { passed: false, detail: `rejected (${record.verdict.category}): ${record.verdict.reasoning}` };
	}
	return { passed: false, detail: `${record.state}: ${record.failure?.message ?? 'no failure recorded'}` };
}

function judgeNegative(record: TaskRecord): { passed: boolean; detail: string } {
	const { verdict } = record;
	if (!verdict) {
		return { passed: false, detail: `no verdict: ${record.failure?.message ?? record.state}` };
	}
	if (verdict.approved) {
		return { passed: false, detail: 'approved a command that must be rejected' };
	}
	return { passed: true, detail: `rejected (${verdict.category}): ${verdict.reasoning}` };
}

async function runCase(scenario: ScenarioCase, deps: HarnessDeps): Promise<CaseResult> {
	const started = Date.now();
	let outcome: { passed: boolean; detail: string };
	let session: Session | undefined;

	try {
		session = await deps.createSession({ baseDir: deps.baseDir, purgeOnClose: true });
		await scenario.setup?.(session.sandboxRoot);
		const orchestrator = deps.createOrchestrator(session);

		if (scenario.kind === 'negative') {
			const command = commandFor(scenario, deps.platform);
			const record =
				command === undefined
					? await orchestrator.runTask(scenario.task, { reviewOnly: true, context: scenario.context })
					: await orchestrator.reviewCommand(command, scenario.name, { context: scenario.context });
			outcome = judgeNegative(record);
		} else {
			const record = await orchestrator.runTask(scenario.task, {
				expectations: scenario.expectations,
				context: scenario.context,
			});
			outcome = judgePositive(record);
		}
	} catch (err: unknown) {
		outcome = { passed: false, detail: `error: ${err instanceof Error ? err.message : String(err)}` };
	} finally {
		if (session) {
			try {
				await session.close();
			} catch (err: unknown) {
				logger.warn('Failed to purge case root', {
					scenario: scenario.name,
					error: err instanceof Error ? err.message : String(err),
				});
			}
		}
	}

	const result: CaseResult = {
		name: scenario.name,
		kind: scenario.kind,
		passed: outcome.passed,
		detail: outcome.detail,
		durationMs: Date.now() - started,
	};
	logger.info('Case finished', { scenario: scenario.name, kind: scenario.kind, passed: result.passed });
	return result;
}

/**
 * Runs every case on its own fresh sandbox root. Positives must reach
 * `verified`; negatives must be rejected. Rows keep the input order
 * whatever the concurrency.
 */
export async function runBattery(cases: readonly ScenarioCase[], deps: HarnessDeps): Promise<HarnessReport> {
	const requested = deps.concurrency ?? 1;
	const workers = Number.isInteger(requested) && requested >= 1 ? Math.min(requested, Math.max(cases.length, 1)) : 1;
	const slots: Array<CaseResult | undefined> = cases.map(() => undefined);
	let next = 0;

	async function worker(): Promise<void> {
		while (next < cases.length) {
			const index = next++;
			const scenario = cases[index];
			if (scenario) slots[index] = await runCase(scenario, deps);
		}
	}

	await Promise.all(Array.from({ length: workers }, () => worker()));

	const rows = slots.filter((row): row is CaseResult => row !== undefined);
	// A case that produced no row counts as a failure.
	const passed = rows.length === cases.length && rows.every((row) => row.passed);
	logger.info('Battery finished', {
		cases: rows.length,
		failed: rows.filter((row) => !row.passed).length,
	});
	return { rows, passed, exitCode: passed ? 0 : 1 };
}
