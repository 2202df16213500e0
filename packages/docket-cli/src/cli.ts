#!/usr/bin/env node
// packages/docket-cli/src/cli.ts
import { parseRequestedFormat, run } from './index.js';
import { handleError } from './errors.js';

run().catch((error: unknown) => handleError(error, parseRequestedFormat(process.argv.slice(2)) === 'json'));
