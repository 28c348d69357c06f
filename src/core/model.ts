import { v4 as uuidv4 } from 'uuid';
import type { CommandProposal, RejectionCategory, ReviewVerdict } from './types.js';

export function createProposal(command: string, rationale = '', id: string = uuidv4()): CommandProposal {
	return Object.freeze({ id, command, rationale });
}

export function approveVerdict(proposal: CommandProposal, reasoning?: string): ReviewVerdict {
	return Object.freeze(
		reasoning === undefined
			? { proposalId: proposal.id, approved: true as const }
			: { proposalId: proposal.id, approved: true as const, reasoning },
	);
}

export function rejectVerdict(
	proposal: CommandProposal,
	category: RejectionCategory,
	classifier: string,
	reasoning: string,
): ReviewVerdict {
	return Object.freeze({
		proposalId: proposal.id,
		approved: false as const,
		reasoning,
		category,
		classifier,
	});
}
