#!/usr/bin/env node

import { Command } from 'commander';
import { registerApplyCommand } from './cli/apply.js';
import { registerAuditCommand } from './cli/audit.js';
import { registerInitCommand } from './cli/init.js';
import { registerRegressCommand } from './cli/regress.js';
import { registerReviewCommand } from './cli/review.js';
import { registerRunCommand } from './cli/run.js';
import { createAppRuntime } from './cli/runtime.js';

const program = new Command();
const services = { resolveRuntime: createAppRuntime };

program
	.name('shellgate')
	.description('Policy-gated shell command execution: propose, review, execute in a sandbox root, verify')
	.version('0.1.0');

registerRunCommand(program, services);
registerReviewCommand(program, services);
registerApplyCommand(program, services);
registerRegressCommand(program, services);
registerAuditCommand(program, services);
registerInitCommand(program);

await program.parseAsync();
