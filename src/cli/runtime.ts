import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { createFileActionExecutor, type FileActionExecutor } from '../actions/executor.js';
import { createLLMProposer } from '../agents/proposer.js';
import { createLLMReviewer } from '../agents/reviewer.js';
import { ensureShellgateHome, expandHome, initConfig, resolvePlatform } from '../config/index.js';
import type { Platform, ShellgateConfig } from '../config/schema.js';
import { createOrchestrator, type Orchestrator } from '../core/orchestrator.js';
import { createSession, type Session, type SessionOptions } from '../core/session.js';
import type { Proposer } from '../core/types.js';
import { createClaudeProvider } from '../llm/providers/claude.js';
import { createOllamaProvider } from '../llm/providers/ollama.js';
import { createLLMRouter } from '../llm/router.js';
import { createPolicyEngine, type PolicyEngine } from '../policy/engine.js';
import { createGatedReviewer, type GatedReviewer } from '../policy/gated-reviewer.js';
import { createAuditStore } from '../sandbox/audit.js';
import { createSandboxedExecutor } from '../sandbox/executor.js';
import type { AuditStore } from '../sandbox/types.js';
import { initLogger } from '../utils/logger.js';

export interface AppRuntime {
	config: ShellgateConfig;
	platform: Platform;
	engine: PolicyEngine;
	reviewer: GatedReviewer;
	audit: AuditStore;
	/** LLM-backed proposer; nothing is contacted until it is asked. */
	proposer: Proposer;
	openSession(options?: SessionOptions): Promise<Session>;
	createOrchestrator(session: Session, proposer?: Proposer, maxRevisions?: number): Orchestrator;
	createFileActionExecutor(session: Session): FileActionExecutor;
	close(): void;
}

export interface RuntimeOptions {
	configPath?: string;
	platform?: Platform;
	verbose?: boolean;
}

/**
 * Wires config, logging, the audit store, the LLM router and the policy
 * gate into one object the CLI commands share.
 */
export function createAppRuntime(options: RuntimeOptions = {}): AppRuntime {
	const configResult = initConfig(options.configPath);
	if (!configResult.ok) {
		throw configResult.error;
	}
	const config = configResult.value;
	ensureShellgateHome();
	initLogger({
		level: config.logging.level,
		filePath: expandHome(config.logging.file),
		silent: !options.verbose,
	});

	const platform = options.platform ?? resolvePlatform(config);
	const dbPath = expandHome(config.audit.dbPath);
	mkdirSync(dirname(dbPath), { recursive: true });
	const audit = createAuditStore(dbPath);

	const claudeProvider = config.llm.providers.claude.apiKey
		? createClaudeProvider({
				apiKey: config.llm.providers.claude.apiKey,
				defaultModel: config.llm.providers.claude.defaultModel,
			})
		: undefined;
	const ollamaProvider = createOllamaProvider({
		host: config.llm.providers.ollama.host,
		apiKey: config.llm.providers.ollama.apiKey || undefined,
		defaultModel: config.llm.providers.ollama.defaultModel,
	});
	const router = createLLMRouter({ config, claudeProvider, ollamaProvider });

	const engine = createPolicyEngine({
		platform,
		protectedPaths: config.policy.protectedPaths,
		allowedExternalPaths: config.policy.allowedExternalPaths,
	});
	const reviewer = createGatedReviewer({
		engine,
		reviewer: config.llm.roles.reviewer.enabled ? createLLMReviewer({ router, platform }) : undefined,
		timeoutMs: config.llm.roles.reviewer.timeoutMs,
	});
	const proposer = createLLMProposer({ router, platform });

	function openSession(sessionOptions: SessionOptions = {}): Promise<Session> {
		const configuredRoot = config.sandbox.root ? expandHome(config.sandbox.root) : undefined;
		const sandboxRoot = sessionOptions.sandboxRoot ?? (sessionOptions.baseDir ? undefined : configuredRoot);
		return createSession({
			...sessionOptions,
			sandboxRoot,
			// A root the user named is never purged.
			purgeOnClose: sandboxRoot ? false : (sessionOptions.purgeOnClose ?? config.sandbox.purgeOnClose),
			audit: sessionOptions.audit ?? audit,
		});
	}

	function createOrchestratorFor(session: Session, sessionProposer?: Proposer, maxRevisions?: number): Orchestrator {
		const executor = createSandboxedExecutor({
			sandboxRoot: session.sandboxRoot,
			platform,
			allowedExternalPaths: config.policy.allowedExternalPaths,
			maxOutputBytes: config.execution.maxOutputBytes,
			defaultTimeoutMs: config.execution.timeoutMs,
			killGraceMs: config.execution.killGraceMs,
			audit: session.audit,
			sessionId: session.id,
			logger: session.logger,
		});
		return createOrchestrator({
			session,
			proposer: sessionProposer ?? proposer,
			reviewer,
			executor,
			maxRevisions: maxRevisions ?? config.orchestrator.maxRevisions,
		});
	}

	function createFileActionExecutorFor(session: Session): FileActionExecutor {
		return createFileActionExecutor({
			sandboxRoot: session.sandboxRoot,
			allowedExternalPaths: config.policy.allowedExternalPaths,
			maxReadBytes: config.execution.maxOutputBytes,
			audit: session.audit,
			sessionId: session.id,
			logger: session.logger,
		});
	}

	return {
		config,
		platform,
		engine,
		reviewer,
		audit,
		proposer,
		openSession,
		createOrchestrator: createOrchestratorFor,
		createFileActionExecutor: createFileActionExecutorFor,
		close() {
			audit.close();
		},
	};
}

/** Commander argument parser for whole numbers of at least `minimum`. */
export function integerOption(minimum: number): (value: string) => number {
	return (value) => {
		const parsed = Number(value);
		if (value.trim() === '' || !Number.isInteger(parsed) || parsed < minimum) {
			throw new InvalidArgumentError(`Must be a whole number of at least ${minimum}.`);
		}
		return parsed;
	};
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
