import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { CliContext, CliOutput, Env } from '../src/index.js';
import { buildProgram } from '../src/index.js';

export const TEST_PASSWORD = 'test-password-1';

export interface CliTestContext {
  ctx: CliContext;
  lines: string[];
  dir: string;
  storagePath: string;
  mediaPath: string;
}

export async function createCliTestContext(extraEnv: Env = {}): Promise<CliTestContext> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-test-'));
  const storagePath = path.join(dir, 'storage');
  const mediaPath = path.join(dir, 'media');
  const lines: string[] = [];
  const output: CliOutput = {
    line: (message = '') => lines.push(message),
    success: (message) => lines.push(`✔ ${message}`),
    error: (message) => lines.push(`✖ ${message}`),
  };
  const ctx: CliContext = {
    env: {
      SECRET_KEY: 'test-secret',
      STORAGE_PATH: storagePath,
      MEDIA_PATH: mediaPath,
      EMAIL_TRANSPORT: 'json',
      PASSWORD_HASH_ITERATIONS: '1000',
      ...extraEnv,
    },
    cwd: dir,
    output,
    waitForShutdown: () => Promise.resolve('SIGTERM'),
  };
  return { ctx, lines, dir, storagePath, mediaPath };
}

export async function cleanupCliTestContext(context: CliTestContext): Promise<void> {
  await fs.rm(context.dir, { recursive: true, force: true });
}

/**
 * Parse argv through the real program and return the exit code
 */
export async function runCli(context: CliTestContext, args: string[]): Promise<number> {
  let exitCode = -1;
  const program = buildProgram(context.ctx, (code) => {
    exitCode = code;
  });
  program.exitOverride();
  program.configureOutput({
    writeOut: (text) => context.lines.push(text.trimEnd()),
    writeErr: (text) => context.lines.push(text.trimEnd()),
  });
  await program.parseAsync(args, { from: 'user' });
  return exitCode;
}
