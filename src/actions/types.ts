import { z } from 'zod';

export const ReadFileActionSchema = z.object({
	action: z.literal('read-file'),
	path: z.string().min(1),
});

export const WriteFileActionSchema = z.object({
	action: z.literal('write-file'),
	path: z.string().min(1),
	/** Replaces the whole file. */
	content: z.string(),
});

export const ApplyPatchActionSchema = z.object({
	action: z.literal('apply-patch'),
	patch: z.string().min(1),
});

/** A file operation proposed instead of a shell command. */
export const FileActionSchema = z.discriminatedUnion('action', [
	ReadFileActionSchema,
	WriteFileActionSchema,
	ApplyPatchActionSchema,
]);

export type FileAction = z.infer<typeof FileActionSchema>;

export interface FileChange {
	readonly path: string;
	readonly kind: 'added' | 'updated' | 'moved' | 'deleted';
	readonly movedTo?: string;
}

export interface FileActionResult {
	readonly proposalId: string;
	readonly action: FileAction['action'];
	readonly changes: readonly FileChange[];
	/** File text for `read-file`, cut at the read budget. */
	readonly content?: string;
	readonly truncated: boolean;
	readonly bytesWritten: number;
	readonly durationMs: number;
}
