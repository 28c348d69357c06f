export {
	DEFAULT_CLASSIFIERS,
	destructiveRootClassifier,
	findContainmentViolation,
	pathContainmentClassifier,
	platformCompatClassifier,
	portabilityRulesFor,
	syntaxClassifier,
	systemFileClassifier,
	type ContainmentViolation,
} from './classifiers/index.js';
export { createPolicyEngine, type FileActionReview, type PolicyEngine } from './engine.js';
export { createGatedReviewer, type GatedReviewer, type GatedReviewerDeps } from './gated-reviewer.js';
export { parseCommand, type ParsedCommand, type ShellToken } from './shell-tokens.js';
export type { Classifier, ClassifierContext, ClassifierFinding, PolicyOptions } from './types.js';
