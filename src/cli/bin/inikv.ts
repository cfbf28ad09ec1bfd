#!/usr/bin/env tsx
// src/cli/bin/inikv.ts
// CLI bootstrap (executes the parser). Kept apart from the factory so tests
// can build the program without running it.
import { CommanderError } from 'commander';

import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // Commander has already printed its own usage errors.
    if (e instanceof CommanderError) process.exitCode = e.exitCode;
    else {
      console.error(e);
      process.exitCode = 1;
    }
  });
