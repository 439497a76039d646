#!/usr/bin/env node

/**
 * conftree CLI entrypoint
 */

import { describeFatalError, run } from './index';

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    const fatal = describeFatalError(err);
    console.error(fatal.message);
    process.exitCode = fatal.exitCode;
  });
