import type { Platform } from '../config/schema.js';
import { ProposalFailure } from '../core/errors.js';
import { createProposal } from '../core/model.js';
import type { CommandProposal, Proposer } from '../core/types.js';
import type { LLMRouter } from '../llm/router.js';
import { createLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import { parseProposalOutput } from './parsing.js';
import { proposerSystemPrompt, proposerUserPrompt } from './prompts.js';

const logger = createLogger('agents:proposer');

interface LLMProposerDeps {
	router: Pick<LLMRouter, 'complete'>;
	platform: Platform;
	/** Overall budget for one proposal, fallback included. */
	timeoutMs?: number;
}

export function createLLMProposer(deps: LLMProposerDeps): Proposer {
	async function request(task: string, context: string): Promise<string> {
		const pending = deps.router.complete({
			role: 'proposer',
			systemPrompt: proposerSystemPrompt(deps.platform),
			messages: [{ role: 'user', content: proposerUserPrompt(task, context) }],
		});
		const response = deps.timeoutMs === undefined ? await pending : await withTimeout(pending, deps.timeoutMs, 'Proposer');
		return response.content;
	}

	async function propose(task: string, context: string): Promise<CommandProposal> {
		let content: string;
		try {
			content = await request(task, context);
		} catch (err: unknown) {
			if (err instanceof TimeoutError) {
				throw ProposalFailure.timeout(err.timeoutMs);
			}
			const message = err instanceof Error ? err.message : String(err);
			throw new ProposalFailure(`Proposer unavailable: ${message}`);
		}

		const parsed = parseProposalOutput(content);
		if (!parsed.ok) {
			logger.warn('Unusable proposer answer', { reason: parsed.error.message });
			throw new ProposalFailure(parsed.error.message, { raw: content.slice(0, 500) });
		}

		const proposal = createProposal(parsed.value.command, parsed.value.rationale);
		logger.debug('Command proposed', { proposalId: proposal.id, command: proposal.command });
		return proposal;
	}

	return { propose };
}
