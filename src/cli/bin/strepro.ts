#!/usr/bin/env -S npx tsx
// src/cli/bin/strepro.ts
// CLI bootstrap (executes the parser). Kept apart from src/cli/index.ts so
// importing the factory never parses argv.
import { makeCli } from '..';
import { parseCli } from '../cli-utils';
import { reportFailure } from '../output';

parseCli(makeCli()).catch((e: unknown) => {
  reportFailure(e);
});
