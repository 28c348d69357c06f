export { createClaudeProvider } from './providers/claude.js';
export { createOllamaProvider } from './providers/ollama.js';
export { createLLMRouter, type LLMRouter } from './router.js';
export type {
	LLMProvider,
	LLMProviderInterface,
	LLMRequest,
	LLMResponse,
	LLMRole,
	Message,
	MessageRole,
	RoutingDecision,
	TokenUsage,
} from './types.js';
