#!/usr/bin/env node
import { configureLoggerFromEnv } from '../shared/logging/structured.js';
import { createProgram } from './program.js';

configureLoggerFromEnv();

await createProgram().parseAsync(process.argv);
