import { z } from 'zod';

export const PlatformSchema = z.enum(['bsd', 'gnu']);

const SandboxSchema = z.object({
	/** Absolute sandbox root; empty means a fresh temporary directory per session. */
	root: z.string().default(''),
	/** Target platform for flag portability checks; empty means detect from the host. */
	platform: z.union([PlatformSchema, z.literal('')]).default(''),
	purgeOnClose: z.boolean().default(true),
});

const PolicySchema = z.object({
	protectedPaths: z
		.array(z.string())
		.default([
			'/etc/**',
			'/usr/**',
			'/bin/**',
			'/sbin/**',
			'/boot/**',
			'/var/**',
			'/dev/**',
			'/System/**',
			'/Library/**',
			'~/.bashrc',
			'~/.bash_profile',
			'~/.zshrc',
			'~/.zprofile',
			'~/.profile',
			'~/.gitconfig',
			'~/.ssh/**',
			'~/.config/**',
		]),
	allowedExternalPaths: z.array(z.string()).default(['/dev/null', '/dev/stdout', '/dev/stderr']),
});

const ExecutionSchema = z.object({
	timeoutMs: z.number().int().positive().default(30_000),
	maxOutputBytes: z
		.number()
		.int()
		.positive()
		.default(1024 * 1024),
	killGraceMs: z.number().int().nonnegative().default(500),
});

const ClaudeProviderSchema = z.object({
	apiKey: z.string().default(''),
	defaultModel: z.string().default('claude-sonnet-4-20250514'),
});

const OllamaProviderSchema = z.object({
	host: z.string().url().default('http://localhost:11434'),
	apiKey: z.string().default(''),
	defaultModel: z.string().default('qwen2.5-coder:7b'),
});

const ProviderNameSchema = z.enum(['claude', 'ollama']);

const RoleSchema = z.object({
	provider: ProviderNameSchema.default('ollama'),
	model: z.string().default(''),
	temperature: z.number().min(0).max(2).default(0.1),
	maxTokens: z.number().int().positive().default(1024),
	timeoutMs: z.number().int().positive().default(60_000),
});

const LlmSchema = z.object({
	providers: z
		.object({
			claude: ClaudeProviderSchema.default({}),
			ollama: OllamaProviderSchema.default({}),
		})
		.default({}),
	roles: z
		.object({
			proposer: RoleSchema.default({}),
			reviewer: RoleSchema.extend({ enabled: z.boolean().default(false) }).default({}),
		})
		.default({}),
});

const OrchestratorSchema = z.object({
	maxRevisions: z.number().int().min(0).max(10).default(2),
});

const HarnessSchema = z.object({
	concurrency: z.number().int().positive().default(1),
});

const LoggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	file: z.string().default('~/.shellgate/logs/shellgate.log'),
});

const AuditSchema = z.object({
	dbPath: z.string().default('~/.shellgate/audit.db'),
});

export const ConfigSchema = z.object({
	version: z.number().int().default(1),
	sandbox: SandboxSchema.default({}),
	policy: PolicySchema.default({}),
	execution: ExecutionSchema.default({}),
	llm: LlmSchema.default({}),
	orchestrator: OrchestratorSchema.default({}),
	harness: HarnessSchema.default({}),
	logging: LoggingSchema.default({}),
	audit: AuditSchema.default({}),
});

export type ShellgateConfig = z.infer<typeof ConfigSchema>;
export type Platform = z.infer<typeof PlatformSchema>;
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
