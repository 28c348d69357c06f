import { rejectVerdict } from '../core/model.js';
import type { CommandProposal, Reviewer, ReviewVerdict } from '../core/types.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { PolicyEngine } from './engine.js';

const logger = createLogger('policy:gated-reviewer');

export interface GatedReviewerDeps {
	engine: PolicyEngine;
	/** Generative second opinion; consulted only after the rules approve. */
	reviewer?: Reviewer;
	timeoutMs?: number;
}

export interface GatedReviewer {
	review(proposal: CommandProposal, sandboxRoot: string, context?: string): Promise<ReviewVerdict>;
}

const DEFAULT_REVIEWER_TIMEOUT_MS = 60_000;

/**
 * Composes the rule engine with an optional generative reviewer. A rule
 * rejection is final. Reviewer errors, timeouts and verdicts for another
 * proposal all reject with category `reviewer`.
 */
export function createGatedReviewer(deps: GatedReviewerDeps): GatedReviewer {
	const timeoutMs = deps.timeoutMs ?? DEFAULT_REVIEWER_TIMEOUT_MS;

	async function review(proposal: CommandProposal, sandboxRoot: string, context = ''): Promise<ReviewVerdict> {
		const ruleVerdict = deps.engine.review(proposal, sandboxRoot);
		if (!ruleVerdict.approved || !deps.reviewer) {
			return ruleVerdict;
		}

		let verdict: ReviewVerdict;
		try {
			verdict = await withTimeout(deps.reviewer.assess(proposal, context), timeoutMs, 'Reviewer');
		} catch (err: unknown) {
			const reason = err instanceof Error ? err.message : String(err);
			logger.warn('Reviewer failed, rejecting proposal', { proposalId: proposal.id, reason });
			return rejectVerdict(proposal, 'reviewer', 'generative-reviewer', `Reviewer unavailable: ${reason}`);
		}

		if (verdict.proposalId !== proposal.id) {
			return rejectVerdict(
				proposal,
				'reviewer',
				'generative-reviewer',
				`Reviewer answered for proposal ${verdict.proposalId}`,
			);
		}
		if (!verdict.approved) {
			logger.info('Reviewer rejected proposal', { proposalId: proposal.id, reason: verdict.reasoning });
			return rejectVerdict(proposal, 'reviewer', 'generative-reviewer', verdict.reasoning);
		}
		return verdict;
	}

	return { review };
}
