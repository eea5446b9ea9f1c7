#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './core/cli.js';
import { errorMessage } from './types/orchestration.js';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`[Orchestrator] ${errorMessage(error)}`);
  process.exitCode = 1;
});
