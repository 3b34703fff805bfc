import chalk from 'chalk';
import { ValidationError, describeError } from '../../lib/errors';

export function reportError(error: unknown) {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else {
    console.error(chalk.red(`✗ Error: ${describeError(error)}`));
  }
}
