import type { Platform } from '../config/schema.js';

const USERLAND: Record<Platform, string> = {
	bsd: 'BSD userland (macOS): `sed -i` needs a suffix argument such as `-i \'\'`, no `grep -P`, `stat -f` not `stat -c`',
	gnu: 'GNU userland (Linux): `sed -i` takes no separate suffix, `stat -c` for formats, `date -d` for dates',
};

export function proposerSystemPrompt(platform: Platform): string {
	return [
		'You translate a task into exactly one POSIX shell command.',
		'The command runs with /bin/sh inside a sandbox directory that is the current working directory.',
		'Use only relative paths inside that directory. Never touch paths outside it, never use sudo.',
		`Target platform: ${USERLAND[platform]}.`,
		'Answer with a JSON object and nothing else: {"command": "<one line>", "rationale": "<short reason>"}',
	].join('\n');
}

export function proposerUserPrompt(task: string, context: string): string {
	return context.trim() === '' ? `Task: ${task}` : `Task: ${task}\n\nContext:\n${context}`;
}

export function reviewerSystemPrompt(platform: Platform): string {
	return [
		'You review one shell command before it runs in a sandbox directory.',
		'Reject it if it could delete or overwrite data outside the task, leave the sandbox,',
		`modify system files, or use flags that do not exist on this platform: ${USERLAND[platform]}.`,
		'Answer with a JSON object and nothing else: {"approved": true|false, "reasoning": "<one sentence>"}',
	].join('\n');
}

export function reviewerUserPrompt(command: string, rationale: string, context: string): string {
	const lines = [`Command: ${command}`];
	if (rationale) lines.push(`Rationale: ${rationale}`);
	if (context.trim() !== '') lines.push(`Context:\n${context}`);
	return lines.join('\n');
}
