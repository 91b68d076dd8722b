#!/usr/bin/env node

/**
 * plugin-catalog CLI Entry Point
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
