import type { Platform } from '../config/schema.js';
import type { RejectionCategory } from '../core/types.js';
import type { ParsedCommand } from './shell-tokens.js';

/** What a classifier sees. `sandboxRoot` is already canonical. */
export interface ClassifierContext {
	parsed: ParsedCommand;
	sandboxRoot: string;
	/** Where the command starts; the sandbox root unless given. */
	workingDir?: string;
	homeDir: string;
	platform: Platform;
	protectedPaths: readonly string[];
	allowedExternalPaths: readonly string[];
}

export interface ClassifierFinding {
	category: RejectionCategory;
	reason: string;
}

/** A single hazard rule. Returns `null` when it has no objection. */
export interface Classifier {
	readonly name: string;
	evaluate(context: ClassifierContext): ClassifierFinding | null;
}

export interface PolicyOptions {
	platform: Platform;
	protectedPaths: readonly string[];
	allowedExternalPaths: readonly string[];
	/** Home directory used to expand `~`; defaults to the current user's. */
	homeDir?: string;
	/** Replaces the built-in classifier list. Order is evaluation order. */
	classifiers?: readonly Classifier[];
}
