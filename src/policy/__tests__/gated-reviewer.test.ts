import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { approveVerdict, createProposal, rejectVerdict } from '../../core/model.js';
import type { Reviewer } from '../../core/types.js';
import { createPolicyEngine } from '../engine.js';
import { createGatedReviewer } from '../gated-reviewer.js';

let root: string;

beforeAll(() => {
	root = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-gated-')));
});

afterAll(() => {
	rmSync(root, { recursive: true, force: true });
});

const engine = createPolicyEngine({ platform: 'gnu', protectedPaths: ['/etc/**'], allowedExternalPaths: [] });

describe('createGatedReviewer', () => {
	it('returns the rule verdict when no reviewer is configured', async () => {
		const gated = createGatedReviewer({ engine });
		const proposal = createProposal('ls', '', 'p-1');
		expect(await gated.review(proposal, root)).toEqual({
			proposalId: 'p-1',
			approved: true,
			reasoning: 'Passed 5 safety classifiers',
		});
	});

	it('never consults the reviewer after a rule rejection', async () => {
		const assess = vi.fn<Reviewer['assess']>();
		const gated = createGatedReviewer({ engine, reviewer: { assess } });
		const verdict = await gated.review(createProposal('rm -rf /'), root);
		expect(verdict.approved).toBe(false);
		expect(assess).not.toHaveBeenCalled();
	});

	it('passes the context to the reviewer and returns its approval', async () => {
		const assess = vi.fn<Reviewer['assess']>(async (proposal) => approveVerdict(proposal, 'looks fine'));
		const gated = createGatedReviewer({ engine, reviewer: { assess } });
		const proposal = createProposal('ls', '', 'p-2');

		const verdict = await gated.review(proposal, root, 'list the files');
		expect(assess).toHaveBeenCalledWith(proposal, 'list the files');
		expect(verdict).toEqual({ proposalId: 'p-2', approved: true, reasoning: 'looks fine' });
	});

	it('re-issues a reviewer rejection under the reviewer category', async () => {
		const gated = createGatedReviewer({
			engine,
			reviewer: { assess: async (proposal) => rejectVerdict(proposal, 'destructive', 'llm', 'too broad') },
		});
		const verdict = await gated.review(createProposal('ls', '', 'p-3'), root);
		expect(verdict).toEqual({
			proposalId: 'p-3',
			approved: false,
			reasoning: 'too broad',
			category: 'reviewer',
			classifier: 'generative-reviewer',
		});
	});

	it('rejects when the reviewer fails', async () => {
		const gated = createGatedReviewer({
			engine,
			reviewer: {
				assess: async () => {
					throw new Error('connection refused');
				},
			},
		});
		const verdict = await gated.review(createProposal('ls'), root);
		expect(verdict).toMatchObject({ approved: false, reasoning: 'Reviewer unavailable: connection refused' });
	});

	it('rejects when the reviewer does not answer in time', async () => {
		const gated = createGatedReviewer({
			engine,
			timeoutMs: 20,
			reviewer: { assess: () => new Promise(() => undefined) },
		});
		const verdict = await gated.review(createProposal('ls'), root);
		expect(verdict).toMatchObject({ approved: false, reasoning: 'Reviewer unavailable: Reviewer timed out after 20ms' });
	});

	it('rejects a verdict issued for another proposal', async () => {
		const other = createProposal('ls', '', 'other-id');
		const gated = createGatedReviewer({
			engine,
			reviewer: { assess: async () => approveVerdict(other) },
		});
		const verdict = await gated.review(createProposal('ls', '', 'p-4'), root);
		expect(verdict).toMatchObject({ approved: false, reasoning: 'Reviewer answered for proposal other-id' });
	});
});
