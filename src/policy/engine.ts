import { homedir } from 'node:os';
import { type FileActionPlan, findFileActionViolation, findProtectedWrite, planFileAction } from '../actions/review.js';
import type { FileAction } from '../actions/types.js';
import { InvalidPatch } from '../core/errors.js';
import { approveVerdict, createProposal, rejectVerdict } from '../core/model.js';
import type { CommandProposal, ReviewVerdict } from '../core/types.js';
import { canonicalRoot } from '../sandbox/containment.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_CLASSIFIERS } from './classifiers/index.js';
import { parseCommand } from './shell-tokens.js';
import type { Classifier, ClassifierContext, PolicyOptions } from './types.js';

const logger = createLogger('policy:engine');

export interface FileActionReview {
	/** Proposal whose command is the action's description. */
	proposal: CommandProposal;
	verdict: ReviewVerdict;
	/** Absent when the action could not be parsed. */
	plan?: FileActionPlan;
}

export interface PolicyEngine {
	/** Pure with respect to its inputs: the same proposal and root give the same verdict. */
	review(proposal: CommandProposal, sandboxRoot: string): ReviewVerdict;
	/** Containment and protected-path checks for a read, write or patch. */
	reviewFileAction(action: FileAction, sandboxRoot: string, proposalId?: string): FileActionReview;
	readonly classifiers: readonly Classifier[];
}

/**
 * Creates the rule-based safety gate. Classifiers run in order over a
 * single parse of the command and the first objection rejects.
 */
export function createPolicyEngine(options: PolicyOptions): PolicyEngine {
	const classifiers = options.classifiers ?? DEFAULT_CLASSIFIERS;
	const homeDir = options.homeDir ?? homedir();

	function buildContext(command: string, sandboxRoot: string): ClassifierContext {
		return {
			parsed: parseCommand(command),
			sandboxRoot: canonicalRoot(sandboxRoot),
			homeDir,
			platform: options.platform,
			protectedPaths: options.protectedPaths,
			allowedExternalPaths: options.allowedExternalPaths,
		};
	}

	function review(proposal: CommandProposal, sandboxRoot: string): ReviewVerdict {
		if (proposal.command.trim() === '') {
			logger.info('Proposal rejected', { proposalId: proposal.id, category: 'malformed' });
			return rejectVerdict(proposal, 'malformed', 'input', 'Command is empty');
		}

		const context = buildContext(proposal.command, sandboxRoot);

		for (const classifier of classifiers) {
			const finding = classifier.evaluate(context);
			if (finding) {
				logger.info('Proposal rejected', {
					proposalId: proposal.id,
					classifier: classifier.name,
					category: finding.category,
					reason: finding.reason,
				});
				return rejectVerdict(proposal, finding.category, classifier.name, finding.reason);
			}
		}

		logger.debug('Proposal approved', { proposalId: proposal.id, classifiers: classifiers.length });
		return approveVerdict(proposal, `Passed ${classifiers.length} safety classifiers`);
	}

	function reviewFileAction(action: FileAction, sandboxRoot: string, proposalId?: string): FileActionReview {
		let plan: FileActionPlan;
		try {
			plan = planFileAction(action);
		} catch (err: unknown) {
			if (!(err instanceof InvalidPatch)) throw err;
			const proposal = createProposal(action.action, '', proposalId);
			logger.info('File action rejected', { proposalId: proposal.id, category: 'malformed', reason: err.message });
			return { proposal, verdict: rejectVerdict(proposal, 'malformed', 'patch', err.message) };
		}

		const proposal = createProposal(plan.description, '', proposalId);
		const context = {
			sandboxRoot: canonicalRoot(sandboxRoot),
			homeDir,
			protectedPaths: options.protectedPaths,
			allowedExternalPaths: options.allowedExternalPaths,
		};

		const violation = findFileActionViolation(plan, context);
		if (violation) {
			logger.info('File action rejected', { proposalId: proposal.id, category: 'containment', reason: violation.reason });
			return { proposal, plan, verdict: rejectVerdict(proposal, 'containment', 'path-containment', violation.reason) };
		}
		const protectedWrite = findProtectedWrite(plan, context);
		if (protectedWrite) {
			logger.info('File action rejected', { proposalId: proposal.id, category: 'system-file', reason: protectedWrite });
			return { proposal, plan, verdict: rejectVerdict(proposal, 'system-file', 'system-file', protectedWrite) };
		}

		logger.debug('File action approved', { proposalId: proposal.id });
		return { proposal, plan, verdict: approveVerdict(proposal, 'Every path stays inside the sandbox root') };
	}

	return { review, reviewFileAction, classifiers };
}
