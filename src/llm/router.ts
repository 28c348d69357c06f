import type { ShellgateConfig } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type {
	LLMProvider,
	LLMProviderInterface,
	LLMRequest,
	LLMResponse,
	LLMRole,
	RoutingDecision,
} from './types.js';

const logger = createLogger('llm:router');

export interface LLMRouter {
	complete(request: LLMRequest): Promise<LLMResponse>;
	route(role: LLMRole): RoutingDecision;
}

interface RouterDeps {
	config: ShellgateConfig;
	claudeProvider?: LLMProviderInterface;
	ollamaProvider?: LLMProviderInterface;
}

function defaultModel(config: ShellgateConfig, provider: LLMProvider): string {
	return provider === 'claude'
		? config.llm.providers.claude.defaultModel
		: config.llm.providers.ollama.defaultModel;
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Creates an LLM router that picks a provider per pipeline role.
 * Falls back to the other provider when the primary one fails or times out.
 */
export function createLLMRouter(deps: RouterDeps): LLMRouter {
	const { config } = deps;
	const providers = new Map<LLMProvider, LLMProviderInterface>();

	if (deps.claudeProvider) providers.set('claude', deps.claudeProvider);
	if (deps.ollamaProvider) providers.set('ollama', deps.ollamaProvider);

	function route(role: LLMRole): RoutingDecision {
		const roleConfig = config.llm.roles[role];
		const provider = roleConfig.provider;
		const model = roleConfig.model || defaultModel(config, provider);

		return {
			provider,
			model,
			reason: `Role "${role}" routed to ${provider}/${model}`,
		};
	}

	async function attempt(
		provider: LLMProviderInterface,
		request: LLMRequest,
		model: string,
		role: LLMRole,
	): Promise<LLMResponse> {
		const roleConfig = config.llm.roles[role];
		return withTimeout(
			provider.complete({
				...request,
				model,
				temperature: request.temperature ?? roleConfig.temperature,
				maxTokens: request.maxTokens ?? roleConfig.maxTokens,
			}),
			roleConfig.timeoutMs,
			`${provider.name} ${role} request`,
		);
	}

	async function complete(request: LLMRequest): Promise<LLMResponse> {
		const role = request.role ?? 'proposer';
		const decision = route(role);
		const startTime = Date.now();
		let primaryError: unknown;

		const primary = providers.get(decision.provider);
		if (primary) {
			try {
				const response = await attempt(primary, request, request.model ?? decision.model, role);
				logger.info('LLM request completed', {
					provider: decision.provider,
					model: response.model,
					role,
					latencyMs: Date.now() - startTime,
					inputTokens: response.usage.inputTokens,
					outputTokens: response.usage.outputTokens,
				});
				return response;
			} catch (err) {
				primaryError = err;
				logger.warn('Primary provider failed, trying fallback', {
					provider: decision.provider,
					error: errorMessage(err),
				});
			}
		}

		const fallbackName: LLMProvider = decision.provider === 'claude' ? 'ollama' : 'claude';
		const fallback = providers.get(fallbackName);

		if (fallback) {
			try {
				const response = await attempt(fallback, request, defaultModel(config, fallbackName), role);
				logger.info('LLM request completed via fallback', {
					provider: fallbackName,
					model: response.model,
					role,
					latencyMs: Date.now() - startTime,
				});
				return response;
			} catch (err) {
				throw new Error(`All LLM providers failed. Last error: ${errorMessage(err)}`);
			}
		}

		if (primaryError) {
			throw new Error(
				`Primary provider "${decision.provider}" failed and no fallback provider is configured. Last error: ${errorMessage(primaryError)}`,
			);
		}

		throw new Error('No LLM providers available');
	}

	return { complete, route };
}
