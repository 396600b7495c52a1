#!/usr/bin/env node

import { buildProgram } from './index';

buildProgram().parseAsync(process.argv).catch((err: unknown) => {
	console.error('Fatal error:', err);
	process.exit(1);
});
