#!/usr/bin/env node

/**
 * gdfmt CLI entrypoint
 */

import { reportFatal } from './fatal';
import { run } from './index';

run(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (err: unknown) => {
    process.exitCode = reportFatal(err);
  }
);
