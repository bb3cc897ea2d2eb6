#!/usr/bin/env node

import { createProgram } from './program.js';
import { reportError } from './headless.js';

const program = createProgram();

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error, program.opts<{ json?: boolean }>().json);
});
