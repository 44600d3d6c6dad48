import chalk from 'chalk';
import { NoGroupsProducedError, errorMessage } from '../core/split/index.js';

/** Options every split-style command accepts. */
export interface ActionOptions {
  json?: boolean;
}

/**
 * Wrap a command action: any error is printed (red text, or a JSON error
 * object under --json) and the process exits 1. Nothing is retried.
 */
export function splitAction<O extends ActionOptions>(
  fn: (file: string, opts: O) => Promise<void>,
): (file: string, opts: O) => Promise<void> {
  return async (file, opts) => {
    try {
      await fn(file, opts);
    } catch (err) {
      const message = errorMessage(err);
      const name = err instanceof Error ? err.name : 'Error';

      if (opts.json) {
        console.log(JSON.stringify({
          error: name,
          message,
          ...(err instanceof NoGroupsProducedError && { droppedPages: err.droppedPages }),
        }, null, 2));
      } else {
        console.error(chalk.red(`Error: ${message}`));
        if (err instanceof NoGroupsProducedError && err.droppedPages.length > 0) {
          console.error(chalk.dim(`  Pages scanned but ignored: ${err.droppedPages.join(', ')}`));
        }
      }
      process.exit(1);
    }
  };
}
