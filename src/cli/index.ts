#!/usr/bin/env node

import 'dotenv/config';
import chalk from 'chalk';
import { createProgram } from './program';
import { describeError } from '../lib/errors';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`✗ Error: ${describeError(error)}`));
    process.exit(1);
  });
