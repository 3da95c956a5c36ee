#!/usr/bin/env node
/**
 * can-registry — CLI entry point.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
