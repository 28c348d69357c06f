import { type ChatRequest, type Message as OllamaMessage, Ollama } from 'ollama';
import { createLogger } from '../../utils/logger.js';
import type { LLMProviderInterface, LLMRequest, LLMResponse } from '../types.js';

const logger = createLogger('llm:ollama');

/** The part of a chat response the provider reads. */
interface OllamaReply {
	message: { content: string };
	done_reason?: string;
	prompt_eval_count?: number;
	eval_count?: number;
}

interface ChatClient {
	chat(request: ChatRequest & { stream: false }): PromiseLike<OllamaReply>;
}

interface OllamaProviderConfig {
	host: string;
	apiKey?: string;
	defaultModel: string;
	/** Injected in tests; built from `host` otherwise. */
	client?: ChatClient;
}

/**
 * Creates an Ollama (local LLM) provider.
 */
export function createOllamaProvider(config: OllamaProviderConfig): LLMProviderInterface {
	const headers = config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : undefined;
	const client: ChatClient = config.client ?? new Ollama({ host: config.host, headers });

	async function complete(request: LLMRequest): Promise<LLMResponse> {
		const model = request.model ?? config.defaultModel;
		const startTime = Date.now();

		const messages: OllamaMessage[] = request.messages.map((m) => ({ role: m.role, content: m.content }));
		if (request.systemPrompt) {
			messages.unshift({ role: 'system', content: request.systemPrompt });
		}

		logger.debug('Ollama request', { model, messageCount: messages.length });

		const options: NonNullable<ChatRequest['options']> = {};
		if (request.temperature !== undefined) {
			options.temperature = request.temperature;
		}
		if (request.maxTokens) {
			options.num_predict = request.maxTokens;
		}

		const response = await client.chat({ model, messages, options, stream: false });
		const latencyMs = Date.now() - startTime;

		const inputTokens = response.prompt_eval_count ?? 0;
		const outputTokens = response.eval_count ?? 0;

		logger.debug('Ollama response', {
			model,
			latencyMs,
			inputTokens,
			outputTokens,
		});

		return {
			content: response.message.content,
			usage: { inputTokens, outputTokens },
			model,
			provider: 'ollama',
			finishReason: response.done_reason === 'length' ? 'max_tokens' : 'end',
		};
	}

	return {
		name: 'ollama',
		complete,
	};
}
