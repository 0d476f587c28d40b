import { createRequire } from 'node:module';
import { z } from 'zod';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../../package.json');

export const VERSION = z.object({ version: z.string() }).parse(pkg).version;
