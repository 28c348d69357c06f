export {
	cleanCommandText,
	extractJsonBlock,
	parseProposalOutput,
	parseReviewOutput,
	type ProposalOutput,
	type ReviewOutput,
	stripThinking,
} from './parsing.js';
export { createLLMProposer } from './proposer.js';
export { createLLMReviewer } from './reviewer.js';
export { createScriptedProposer, type Script } from './scripted.js';
