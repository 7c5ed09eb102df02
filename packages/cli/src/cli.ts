#!/usr/bin/env node

import 'reflect-metadata';

import { createProgram } from './program.js';
import { exitWithError } from './options.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => exitWithError(err));
