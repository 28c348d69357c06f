// src/llm/types.ts: LLM subsystem type definitions

/** Supported LLM providers */
export type LLMProvider = 'claude' | 'ollama';

/** Pipeline roles that talk to a model; each is routed independently */
export type LLMRole = 'proposer' | 'reviewer';

export type MessageRole = 'user' | 'assistant';

/** A message in the conversation */
export interface Message {
	role: MessageRole;
	content: string;
}

/** Request sent to an LLM provider */
export interface LLMRequest {
	messages: Message[];
	systemPrompt?: string;
	/** Override the default model for this request */
	model?: string;
	temperature?: number;
	maxTokens?: number;
	/** Used by the router to select provider/model */
	role?: LLMRole;
}

/** Response returned from an LLM provider */
export interface LLMResponse {
	content: string;
	usage: TokenUsage;
	model: string;
	provider: LLMProvider;
	finishReason: 'end' | 'max_tokens';
}

/** Token usage counts for a single request */
export interface TokenUsage {
	inputTokens: number;
	outputTokens: number;
}

/** Result of the router deciding which provider/model handles a request */
export interface RoutingDecision {
	provider: LLMProvider;
	model: string;
	reason: string;
}

/** Interface that every LLM provider must implement */
export interface LLMProviderInterface {
	name: LLMProvider;
	complete(request: LLMRequest): Promise<LLMResponse>;
}
