import Anthropic from '@anthropic-ai/sdk';
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages';
import { createLogger } from '../../utils/logger.js';
import type { LLMProviderInterface, LLMRequest, LLMResponse, Message } from '../types.js';

const logger = createLogger('llm:claude');

/** The part of the Messages API the provider reads. */
interface ClaudeReply {
	content: ReadonlyArray<{ type: string; text?: string }>;
	model: string;
	stop_reason: string | null;
	usage: { input_tokens: number; output_tokens: number };
}

interface MessagesClient {
	messages: { create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<ClaudeReply> };
}

interface ClaudeProviderConfig {
	apiKey: string;
	defaultModel: string;
	/** Injected in tests; built from `apiKey` otherwise. */
	client?: MessagesClient;
}

function convertMessages(messages: Message[]): MessageParam[] {
	return messages.map((msg) => ({ role: msg.role, content: msg.content }));
}

function mapFinishReason(stopReason: string | null): LLMResponse['finishReason'] {
	switch (stopReason) {
		case 'max_tokens':
			return 'max_tokens';
		default:
			return 'end';
	}
}

/**
 * Creates a Claude (Anthropic) LLM provider.
 */
export function createClaudeProvider(config: ClaudeProviderConfig): LLMProviderInterface {
	const client: MessagesClient = config.client ?? new Anthropic({ apiKey: config.apiKey });

	async function complete(request: LLMRequest): Promise<LLMResponse> {
		const model = request.model ?? config.defaultModel;
		const messages = convertMessages(request.messages);
		const startTime = Date.now();

		logger.debug('Claude request', { model, messageCount: messages.length });

		const params: Anthropic.MessageCreateParamsNonStreaming = {
			model,
			messages,
			max_tokens: request.maxTokens ?? 1024,
		};

		if (request.systemPrompt) {
			params.system = request.systemPrompt;
		}

		if (request.temperature !== undefined) {
			params.temperature = request.temperature;
		}

		const response = await client.messages.create(params);
		const latencyMs = Date.now() - startTime;

		let textContent = '';
		for (const block of response.content) {
			if (block.type === 'text' && block.text !== undefined) {
				textContent += block.text;
			}
		}

		logger.debug('Claude response', {
			model: response.model,
			latencyMs,
			inputTokens: response.usage.input_tokens,
			outputTokens: response.usage.output_tokens,
			stopReason: response.stop_reason,
		});

		return {
			content: textContent,
			usage: {
				inputTokens: response.usage.input_tokens,
				outputTokens: response.usage.output_tokens,
			},
			model: response.model,
			provider: 'claude',
			finishReason: mapFinishReason(response.stop_reason),
		};
	}

	return {
		name: 'claude',
		complete,
	};
}
