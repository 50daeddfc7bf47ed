#!/usr/bin/env tsx
import {colorConsole} from '../../shared/src/logging.ts';
import {evalGcNvp} from './eval-gc-nvp.ts';

evalGcNvp().then(
  code => {
    // stdin may still be open after a failure.
    if (code !== 0) {
      process.exit(code);
    }
  },
  e => {
    colorConsole.error(`Unexpected error: ${e}`);
    process.exit(1);
  },
);
