#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { run } from './cli/run.js';

process.exitCode = await run(process.argv.slice(2));
