#!/usr/bin/env node
import { consoleOutput } from './output.js';
import { waitForProcessSignal } from './context.js';
import { buildProgram } from './program.js';
import { loadEnvFile } from './settings.js';

loadEnvFile();

const program = buildProgram(
  { env: process.env, cwd: process.cwd(), output: consoleOutput, waitForShutdown: waitForProcessSignal },
  (code) => {
    process.exitCode = code;
  }
);

program.parseAsync(process.argv).catch((error: unknown) => {
  consoleOutput.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
