export {
	createFileActionExecutor,
	type FileActionExecutor,
	type FileActionExecutorOptions,
	summarizeChanges,
} from './executor.js';
export {
	applyHunks,
	type PatchHunk,
	type PatchLine,
	type PatchOperation,
	type PlannedChange,
	parsePatch,
	patchPaths,
	planPatch,
} from './patch.js';
export {
	type FileActionContext,
	type FileActionPlan,
	findFileActionViolation,
	findProtectedWrite,
	planFileAction,
} from './review.js';
export {
	ApplyPatchActionSchema,
	type FileAction,
	type FileActionResult,
	FileActionSchema,
	type FileChange,
	ReadFileActionSchema,
	WriteFileActionSchema,
} from './types.js';
