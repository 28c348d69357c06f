import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createProposal } from '../../core/model.js';
import { createPolicyEngine } from '../engine.js';
import type { Classifier } from '../types.js';

let root: string;
let home: string;

beforeAll(() => {
	root = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-engine-')));
	home = realpathSync(mkdtempSync(join(tmpdir(), 'shellgate-engine-home-')));
});

afterAll(() => {
	rmSync(root, { recursive: true, force: true });
	rmSync(home, { recursive: true, force: true });
});

const baseOptions = {
	protectedPaths: ['/etc/**', '~/.bashrc'],
	allowedExternalPaths: ['/dev/null'],
};

describe('createPolicyEngine', () => {
	it('approves a plain command with a summary of the checks', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });
		const proposal = createProposal('ls -la', '', 'p-1');
		expect(engine.review(proposal, root)).toEqual({
			proposalId: 'p-1',
			approved: true,
			reasoning: 'Passed 5 safety classifiers',
		});
	});

	it('rejects an empty command as malformed', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });
		expect(engine.review(createProposal('   ', '', 'p-2'), root)).toEqual({
			proposalId: 'p-2',
			approved: false,
			reasoning: 'Command is empty',
			category: 'malformed',
			classifier: 'input',
		});
	});

	it('never lets rm -rf / through', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });
		const verdict = engine.review(createProposal('rm -rf /'), root);
		expect(verdict.approved).toBe(false);
		if (!verdict.approved) {
			expect(verdict.category).toBe('destructive');
			expect(verdict.classifier).toBe('destructive-root');
		}
	});

	it('rejects multi-level traversal to /etc/passwd as containment', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });
		const verdict = engine.review(createProposal('cat sandbox/../../../etc/passwd'), root);
		expect(verdict.approved).toBe(false);
		if (!verdict.approved) expect(verdict.category).toBe('containment');
	});

	it('judges sed -i by the target platform', () => {
		const bsd = createPolicyEngine({ ...baseOptions, platform: 'bsd', homeDir: home });
		expect(bsd.review(createProposal(`sed -i '' 's/hello/goodbye/g' greeting.txt`), root).approved).toBe(true);
		const rejected = bsd.review(createProposal(`sed -i 's/hello/goodbye/g' greeting.txt`), root);
		expect(rejected.approved).toBe(false);
		if (!rejected.approved) expect(rejected.category).toBe('portability');
	});

	it('gives the same verdict for the same proposal', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });
		for (const command of ['ls -la', 'rm -rf *', `echo x >> ~/.bashrc`]) {
			const proposal = createProposal(command);
			expect(engine.review(proposal, root)).toEqual(engine.review(proposal, root));
		}
	});

	it('stops at the first classifier that objects', () => {
		const calls: string[] = [];
		const classifier = (name: string, objects: boolean): Classifier => ({
			name,
			evaluate() {
				calls.push(name);
				return objects ? { category: 'syntax', reason: `${name} objects` } : null;
			},
		});
		const engine = createPolicyEngine({
			...baseOptions,
			platform: 'gnu',
			classifiers: [classifier('first', false), classifier('second', true), classifier('third', true)],
		});

		const verdict = engine.review(createProposal('ls'), root);
		expect(calls).toEqual(['first', 'second']);
		expect(verdict).toMatchObject({ approved: false, classifier: 'second', reasoning: 'second objects' });
	});

	it('requires an absolute sandbox root', () => {
		const engine = createPolicyEngine({ ...baseOptions, platform: 'gnu' });
		expect(() => engine.review(createProposal('ls'), 'relative/root')).toThrow(
			'Sandbox root must be an absolute path, got "relative/root"',
		);
	});
});

describe('reviewFileAction', () => {
	const engine = () => createPolicyEngine({ ...baseOptions, platform: 'gnu', homeDir: home });

	it('approves a write inside the root and describes it', () => {
		const review = engine().reviewFileAction({ action: 'write-file', path: 'notes.txt', content: 'hello\n' }, root, 'fa-1');
		expect(review.proposal.command).toBe('write-file notes.txt (6 bytes)');
		expect(review.verdict).toEqual({
			proposalId: 'fa-1',
			approved: true,
			reasoning: 'Every path stays inside the sandbox root',
		});
	});

	it('rejects reads and writes that leave the root', () => {
		expect(engine().reviewFileAction({ action: 'read-file', path: '../secret.txt' }, root, 'fa-2').verdict).toEqual({
			proposalId: 'fa-2',
			approved: false,
			category: 'containment',
			classifier: 'path-containment',
			reasoning: `Path "../secret.txt" resolves to ${join(dirname(root), 'secret.txt')}, outside the sandbox root`,
		});
		const tilde = engine().reviewFileAction({ action: 'write-file', path: '~/notes.txt', content: '' }, root);
		expect(tilde.verdict).toMatchObject({
			approved: false,
			reasoning: `Path "~/notes.txt" resolves to ${join(home, 'notes.txt')}, outside the sandbox root`,
		});
	});

	it('checks every path a patch touches, including move targets', () => {
		const patch = [
			'*** Begin Patch',
			'*** Update File: a.txt',
			'*** Move to: ../escaped.txt',
			'-one',
			'+uno',
			'*** End Patch',
		].join('\n');
		const review = engine().reviewFileAction({ action: 'apply-patch', patch }, root);
		expect(review.proposal.command).toBe('apply-patch update a.txt -> ../escaped.txt');
		expect(review.verdict).toMatchObject({ approved: false, category: 'containment' });
	});

	it('rejects protected writes that the allow list lets out of the root', () => {
		const lenient = createPolicyEngine({
			platform: 'gnu',
			homeDir: home,
			protectedPaths: ['/etc/**'],
			allowedExternalPaths: ['/etc/**'],
		});
		expect(lenient.reviewFileAction({ action: 'write-file', path: '/etc/motd', content: 'x' }, root).verdict).toMatchObject({
			approved: false,
			category: 'system-file',
			reasoning: 'write-file would modify protected system file /etc/motd',
		});
		expect(lenient.reviewFileAction({ action: 'read-file', path: '/etc/hostname' }, root).verdict.approved).toBe(true);
	});

	it('rejects a patch that does not parse as malformed', () => {
		const review = engine().reviewFileAction({ action: 'apply-patch', patch: 'not a patch' }, root, 'fa-3');
		expect(review.proposal.command).toBe('apply-patch');
		expect(review.plan).toBeUndefined();
		expect(review.verdict).toEqual({
			proposalId: 'fa-3',
			approved: false,
			category: 'malformed',
			classifier: 'patch',
			reasoning: 'Patch is missing the *** Begin Patch line',
		});
	});
});
