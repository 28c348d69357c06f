export {
	DEFAULT_EXPECTATIONS,
	type Expectation,
	ExpectationListSchema,
	ExpectationSchema,
	type ExpectationType,
} from './expectations.js';
export { type VerificationReport, verify, verifyAll } from './verifier.js';
