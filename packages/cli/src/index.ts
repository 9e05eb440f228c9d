// packages/cli/src/index.ts

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
