export { type CaseResult, type HarnessDeps, type HarnessReport, runBattery } from './harness.js';
export { formatReport } from './report.js';
export {
	builtInBattery,
	commandFor,
	referenceScript,
	type ScenarioCase,
	type ScenarioKind,
} from './scenarios.js';
