#!/usr/bin/env tsx

import { buildProgram } from '../src/cli/find-events.js';

await buildProgram().parseAsync(process.argv);
