#!/usr/bin/env node
// src/cli/migrate.ts
import 'reflect-metadata';

import { createCliContext } from './cli-context';
import { runMigrateCli } from './migrate.commands';
import { promptLine } from './utils/prompt';

runMigrateCli(process.argv.slice(2), { openContext: createCliContext, prompt: promptLine })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
