#!/usr/bin/env node
import { run } from './cli.js';
import { loadDotEnvironment } from './config/env.js';

loadDotEnvironment();
process.exitCode = await run(process.argv);
