import { z } from 'zod';

const RelativePath = z.string().min(1, 'path must not be empty');

export const ExpectationSchema = z.discriminatedUnion('type', [
	z.object({
		type: z.literal('file-content-equals'),
		path: RelativePath,
		expected: z.string(),
	}),
	z.object({
		type: z.literal('file-exists'),
		path: RelativePath,
		size: z.number().int().nonnegative().optional(),
	}),
	z.object({
		type: z.literal('file-absent'),
		path: RelativePath,
	}),
	z.object({
		type: z.literal('directory-exists'),
		path: RelativePath,
	}),
	z.object({
		type: z.literal('output-contains'),
		substrings: z.array(z.string()).min(1),
	}),
	z.object({
		type: z.literal('output-line-count'),
		count: z.number().int().nonnegative(),
		pattern: z.string().optional(),
	}),
	z.object({
		type: z.literal('files-equal'),
		source: RelativePath,
		copy: RelativePath,
	}),
	z.object({
		type: z.literal('exit-code'),
		code: z.number().int(),
	}),
]);

export type Expectation = z.infer<typeof ExpectationSchema>;
export type ExpectationType = Expectation['type'];

export const ExpectationListSchema = z.array(ExpectationSchema);

/** Post-condition used when a caller supplies none. */
export const DEFAULT_EXPECTATIONS: readonly Expectation[] = [{ type: 'exit-code', code: 0 }];
