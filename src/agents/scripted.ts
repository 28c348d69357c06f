import { ProposalFailure } from '../core/errors.js';
import { createProposal } from '../core/model.js';
import type { CommandProposal, Proposer } from '../core/types.js';

export type Script = ReadonlyMap<string, string> | ((task: string) => string | undefined);

/**
 * Proposer that answers from a fixed table, for offline regression runs
 * and tests. Unknown tasks fail like an unreachable proposer.
 */
export function createScriptedProposer(script: Script): Proposer {
	const lookup = typeof script === 'function' ? script : (task: string) => script.get(task);

	async function propose(task: string): Promise<CommandProposal> {
		const command = lookup(task);
		if (command === undefined) {
			throw new ProposalFailure(`No scripted command for task "${task}"`);
		}
		if (command.trim() === '') {
			throw ProposalFailure.empty();
		}
		return createProposal(command, 'scripted reference command');
	}

	return { propose };
}
