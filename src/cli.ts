#!/usr/bin/env node
import { createRequire } from 'node:module';
import { z } from 'zod';
import { createProgram } from './commands';

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

await createProgram(pkg.version).parseAsync();
