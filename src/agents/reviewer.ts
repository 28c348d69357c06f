import type { Platform } from '../config/schema.js';
import { approveVerdict, rejectVerdict } from '../core/model.js';
import type { CommandProposal, Reviewer, ReviewVerdict } from '../core/types.js';
import type { LLMRouter } from '../llm/router.js';
import { createLogger } from '../utils/logger.js';
import { parseReviewOutput } from './parsing.js';
import { reviewerSystemPrompt, reviewerUserPrompt } from './prompts.js';

const logger = createLogger('agents:reviewer');

interface LLMReviewerDeps {
	router: Pick<LLMRouter, 'complete'>;
	platform: Platform;
}

/**
 * Generative reviewer. An answer that does not validate as
 * `{approved, reasoning}` is a rejection; provider errors propagate.
 */
export function createLLMReviewer(deps: LLMReviewerDeps): Reviewer {
	async function assess(proposal: CommandProposal, context: string): Promise<ReviewVerdict> {
		const response = await deps.router.complete({
			role: 'reviewer',
			systemPrompt: reviewerSystemPrompt(deps.platform),
			messages: [
				{ role: 'user', content: reviewerUserPrompt(proposal.command, proposal.rationale, context) },
			],
		});

		const parsed = parseReviewOutput(response.content);
		if (!parsed.ok) {
			logger.warn('Unparsable reviewer answer', { proposalId: proposal.id, reason: parsed.error.message });
			return rejectVerdict(proposal, 'reviewer', 'generative-reviewer', parsed.error.message);
		}

		const { approved, reasoning } = parsed.value;
		if (!approved) {
			return rejectVerdict(proposal, 'reviewer', 'generative-reviewer', reasoning || 'Rejected by reviewer');
		}
		return approveVerdict(proposal, reasoning || undefined);
	}

	return { assess };
}
