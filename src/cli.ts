#!/usr/bin/env node
import { buildProgram } from './program.js';
import { cliLogger, setupErrorHandlers } from './utils/logger.js';

setupErrorHandlers(cliLogger);

await buildProgram().parseAsync();
