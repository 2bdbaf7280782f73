#!/usr/bin/env node
/**
 * Deep-TOON CLI
 *
 * Encode, decode and measure documents from files or stdin.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
