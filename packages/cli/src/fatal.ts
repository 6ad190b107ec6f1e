import { FormatError, describeError } from '@gdfmt/core';
import { CLIError, EXIT_CODE } from './index';

/**
 * Report an error that escaped `run` and return the exit code for it.
 * Formatting failures name the pipeline stage that raised them.
 */
export function reportFatal(err: unknown): number {
  if (err instanceof CLIError) {
    console.error(`gdfmt: ${err.message}`);
    return err.exitCode;
  }

  if (err instanceof FormatError) {
    console.error(`gdfmt: ${err.stage} failed: ${describeError(err)}`);
  } else {
    console.error(`gdfmt: ${describeError(err)}`);
  }
  return EXIT_CODE.RUNTIME_ERROR;
}
