#!/usr/bin/env node
/**
 * gifstream CLI
 */

import { buildProgram } from './commands.js';
import { isGifExportError } from './errors.js';

try {
  await buildProgram().parseAsync(process.argv);
} catch (error) {
  if (isGifExportError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
}
