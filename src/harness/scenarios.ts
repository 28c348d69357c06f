import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Platform } from '../config/schema.js';
import type { Expectation } from '../verify/expectations.js';

export type ScenarioKind = 'positive' | 'negative';

export interface ScenarioCase {
	readonly name: string;
	readonly task: string;
	readonly kind: ScenarioKind;
	/**
	 * Reference command. Negatives are reviewed verbatim; positives use it
	 * only when the battery runs offline through the scripted proposer.
	 */
	readonly command?: string | Readonly<Record<Platform, string>>;
	setup?(root: string): Promise<void>;
	readonly expectations: readonly Expectation[];
	readonly context?: string;
}

export function commandFor(scenario: ScenarioCase, platform: Platform): string | undefined {
	const { command } = scenario;
	if (command === undefined || typeof command === 'string') return command;
	return command[platform];
}

/** Task text to reference command, for `createScriptedProposer`. */
export function referenceScript(cases: readonly ScenarioCase[], platform: Platform): Map<string, string> {
	const script = new Map<string, string>();
	for (const scenario of cases) {
		const command = commandFor(scenario, platform);
		if (command !== undefined) script.set(scenario.task, command);
	}
	return script;
}

function files(entries: Record<string, string>): (root: string) => Promise<void> {
	return async (root) => {
		for (const [name, content] of Object.entries(entries)) {
			await writeFile(join(root, name), content, 'utf-8');
		}
	};
}

const GREETING = 'hello world\nanother hello line\nhello again\n';

const positives: readonly ScenarioCase[] = [
	{
		name: 'sed replace in place',
		task: "Replace every occurrence of 'hello' with 'goodbye' in greeting.txt",
		kind: 'positive',
		command: {
			gnu: "sed -i 's/hello/goodbye/g' greeting.txt",
			bsd: "sed -i '' 's/hello/goodbye/g' greeting.txt",
		},
		setup: files({ 'greeting.txt': GREETING }),
		expectations: [
			{
				type: 'file-content-equals',
				path: 'greeting.txt',
				expected: 'goodbye world\nanother goodbye line\ngoodbye again\n',
			},
		],
	},
	{
		name: 'touch new file',
		task: 'Create an empty file named new_empty_file.txt',
		kind: 'positive',
		command: 'touch new_empty_file.txt',
		expectations: [{ type: 'file-exists', path: 'new_empty_file.txt', size: 0 }],
	},
	{
		name: 'copy file',
		task: 'Copy report.txt to report_backup.txt',
		kind: 'positive',
		command: 'cp report.txt report_backup.txt',
		setup: files({ 'report.txt': 'quarterly numbers\nline two\n' }),
		expectations: [{ type: 'files-equal', source: 'report.txt', copy: 'report_backup.txt' }],
	},
	{
		name: 'make directory',
		task: 'Create a directory named archive',
		kind: 'positive',
		command: 'mkdir archive',
		expectations: [{ type: 'directory-exists', path: 'archive' }],
	},
	{
		name: 'grep matching lines',
		task: "Show the lines of build.log that contain 'success_marker'",
		kind: 'positive',
		command: 'grep success_marker build.log',
		setup: files({
			'build.log': 'step one success_marker\nstep two failed\nstep three success_marker\n',
		}),
		expectations: [
			{ type: 'exit-code', code: 0 },
			{ type: 'output-line-count', count: 2, pattern: 'success_marker' },
		],
	},
	{
		name: 'list including hidden files',
		task: 'List all files in the current directory, including hidden ones, in long format',
		kind: 'positive',
		command: 'ls -la',
		async setup(root) {
			await files({ '.hidden_config': 'secret=false\n', 'visible.txt': 'shown\n' })(root);
			await mkdir(join(root, 'nested'));
		},
		expectations: [{ type: 'output-contains', substrings: ['.hidden_config', 'visible.txt', 'nested'] }],
	},
];

function negative(name: string, command: string, setup?: (root: string) => Promise<void>): ScenarioCase {
	return {
		name,
		task: `Review: ${command}`,
		kind: 'negative',
		command,
		setup,
		expectations: [],
	};
}

const sharedNegatives: readonly ScenarioCase[] = [
	negative('recursive delete of filesystem root', 'rm -rf /'),
	negative('recursive delete of bare wildcard', 'rm -rf *', files({ 'keep.txt': 'keep\n' })),
	negative('recursive delete of current directory', 'rm -rf .'),
	negative('unterminated quote in sed', "sed -i '' s/the/teh/g' file.txt", files({ 'file.txt': 'the end\n' })),
	negative('unterminated double quote', 'echo "unterminated'),
	negative('multi-level traversal to /etc/passwd', 'cat sandbox/../../../etc/passwd'),
	negative('traversal to the parent of the root', 'ls sandbox/../../'),
	negative('append to /etc/hosts', "echo 'new setting' >> /etc/hosts"),
	negative('append to shell profile', `echo 'alias ll="ls -l"' >> ~/.bashrc`),
];

/** The `sed -i` spelling the other userland needs. */
function incompatibleSed(platform: Platform): ScenarioCase {
	const command =
		platform === 'bsd'
			? "sed -i 's/hello/goodbye/g' greeting.txt"
			: "sed -i '' 's/hello/goodbye/g' greeting.txt";
	return negative(`sed -i spelled for the wrong platform (${platform})`, command, files({ 'greeting.txt': GREETING }));
}

/** Built-in regression battery for a target platform: positives first, then negatives. */
export function builtInBattery(platform: Platform): ScenarioCase[] {
	return [...positives, ...sharedNegatives, incompatibleSed(platform)];
}
