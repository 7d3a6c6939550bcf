#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';
import { errorMessage } from '../src/utils/errors.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('plugkit failed:', errorMessage(err));
    process.exit(1);
});
