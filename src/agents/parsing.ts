import { z } from 'zod';
import type { Result } from '../core/types.js';

export const ProposalOutputSchema = z.object({
	command: z.string(),
	rationale: z.string().default(''),
});

export const ReviewOutputSchema = z.object({
	approved: z.boolean(),
	reasoning: z.string().default(''),
});

export type ProposalOutput = z.infer<typeof ProposalOutputSchema>;
export type ReviewOutput = z.infer<typeof ReviewOutputSchema>;

/** Drops `<think>…</think>` blocks some local models emit before answering. */
export function stripThinking(text: string): string {
	return text.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
}

export function extractJsonBlock(text: string): string | null {
	const fenced = text.match(/```(?:json)?\s*(\{[\s\S]*?\})\s*```/i);
	if (fenced?.[1]) {
		return fenced[1].trim();
	}

	const start = text.indexOf('{');
	if (start === -1) return null;

	let depth = 0;
	let inString = false;
	let escaping = false;
	for (let i = start; i < text.length; i++) {
		const char = text[i];
		if (!char) continue;

		if (inString) {
			if (escaping) {
				escaping = false;
				continue;
			}
			if (char === '\\') {
				escaping = true;
				continue;
			}
			if (char === '"') {
				inString = false;
			}
			continue;
		}

		if (char === '"') {
			inString = true;
			continue;
		}
		if (char === '{') {
			depth++;
			continue;
		}
		if (char === '}') {
			depth--;
			if (depth === 0) {
				return text.slice(start, i + 1);
			}
		}
	}

	return null;
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/**
 * Removes code fences, surrounding backticks and a leading `$ ` prompt
 * from a bare command answer.
 */
export function cleanCommandText(text: string): string {
	let cleaned = text.trim();
	const fenced = cleaned.match(/^```[\w-]*\s*\n?([\s\S]*?)\n?```$/);
	if (fenced?.[1] !== undefined) {
		cleaned = fenced[1].trim();
	}
	while (cleaned.length >= 2 && cleaned.startsWith('`') && cleaned.endsWith('`')) {
		cleaned = cleaned.slice(1, -1).trim();
	}
	return cleaned.replace(/^\$\s+/, '').trim();
}

/**
 * Reads a proposer answer. JSON `{command, rationale}` is preferred; a bare
 * command line is accepted. The command must be one non-empty line.
 */
export function parseProposalOutput(raw: string): Result<ProposalOutput> {
	const text = stripThinking(raw);
	let output: ProposalOutput | null = null;

	const json = extractJsonBlock(text);
	if (json) {
		const parsed = ProposalOutputSchema.safeParse(parseJson(json));
		if (parsed.success) {
			output = parsed.data;
		}
	}
	output ??= { command: text, rationale: '' };

	const command = cleanCommandText(output.command);
	if (command === '') {
		return { ok: false, error: new Error('Proposer returned an empty command') };
	}
	if (command.includes('\n')) {
		return { ok: false, error: new Error('Proposer returned more than one line') };
	}
	return { ok: true, value: { command, rationale: output.rationale.trim() } };
}

/** Validates a reviewer answer against `{approved, reasoning}`. */
export function parseReviewOutput(raw: string): Result<ReviewOutput> {
	const json = extractJsonBlock(stripThinking(raw));
	if (!json) {
		return { ok: false, error: new Error('Reviewer answer contains no JSON object') };
	}
	const parsed = ReviewOutputSchema.safeParse(parseJson(json));
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		return { ok: false, error: new Error(`Reviewer answer is malformed (${issues.join('; ')})`) };
	}
	return { ok: true, value: parsed.data };
}
