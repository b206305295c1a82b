#!/usr/bin/env tsx
// src/cli/bin/devrelay.ts
// CLI bootstrap (executes the parser). Kept separate from src/cli/index.ts so
// tests can build the CLI without running it.
import { CommanderError } from 'commander';

import { makeCli } from '../index';
import * as log from '../../runner/util/log';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // Commander already printed help or the usage error.
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    log.error([], log.describeError(e));
    process.exitCode = 1;
  });
