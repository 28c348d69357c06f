import type { Classifier } from '../types.js';

const UNTERMINATED_REASONS = {
	'single-quote': 'Unterminated single quote',
	'double-quote': 'Unterminated double quote',
	escape: 'Trailing escape character',
} as const;

export const syntaxClassifier: Classifier = {
	name: 'syntax',
	evaluate({ parsed }) {
		if (parsed.unterminated) {
			return { category: 'syntax', reason: UNTERMINATED_REASONS[parsed.unterminated] };
		}
		if (parsed.unbalancedParens) {
			return { category: 'syntax', reason: 'Unbalanced parentheses or $( substitution' };
		}
		if (parsed.unbalancedBackticks) {
			return { category: 'syntax', reason: 'Unbalanced backtick substitution' };
		}
		const dangling = parsed.danglingOperators[0];
		if (dangling !== undefined) {
			return { category: 'syntax', reason: `Operator "${dangling}" is missing an operand` };
		}
		if (parsed.segments.length === 0) {
			return { category: 'syntax', reason: 'Command contains no words' };
		}
		return null;
	},
};
