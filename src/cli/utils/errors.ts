import chalk from 'chalk';
import { SetupError, ValidationError, LoadTestError } from '../../index.js';

/** Central error handler for CLI commands. */
export function handleError(error: unknown): void {
  if (error instanceof SetupError) {
    console.error('\n' + chalk.yellow('Setup failed'));
    console.error(error.message);
    console.error('No requests were generated.');
  } else if (error instanceof ValidationError) {
    console.error(chalk.red('Invalid option:'), error.message);
  } else if (error instanceof LoadTestError) {
    console.error(chalk.red(`${error.code}:`), error.message);
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
