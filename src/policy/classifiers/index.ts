import type { Classifier } from '../types.js';
import { destructiveRootClassifier } from './destructive-root.js';
import { pathContainmentClassifier } from './path-containment.js';
import { platformCompatClassifier } from './platform-compat.js';
import { syntaxClassifier } from './syntax.js';
import { systemFileClassifier } from './system-file.js';

export { destructiveRootClassifier } from './destructive-root.js';
export {
	type ContainmentViolation,
	findContainmentViolation,
	pathContainmentClassifier,
} from './path-containment.js';
export { platformCompatClassifier, portabilityRulesFor } from './platform-compat.js';
export { syntaxClassifier } from './syntax.js';
export { systemFileClassifier } from './system-file.js';

/** Evaluation order; the first objection wins. */
export const DEFAULT_CLASSIFIERS: readonly Classifier[] = [
	destructiveRootClassifier,
	pathContainmentClassifier,
	platformCompatClassifier,
	syntaxClassifier,
	systemFileClassifier,
];
