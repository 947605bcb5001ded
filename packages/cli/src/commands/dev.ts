/**
 * Development supervisor
 *
 * Seeds the initial data, starts the web server and the worker as child
 * processes and records their PIDs in .dev_pids until asked to stop.
 */

import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ADMIN_PANEL_PATH, API_PREFIX, getWebServerPort } from '@contractor-connect/config';
import { isErrnoError } from '../errors.js';
import type { CliContext } from '../context.js';
import type { CliOutput } from '../output.js';
import { setupInitialData } from './setup.js';

export const PID_FILE_NAME = '.dev_pids';

export type PidRecord = Record<string, number>;

export interface ProcessControl {
  isAlive(pid: number): boolean;
  kill(pid: number, signal: NodeJS.Signals): void;
}

/**
 * The part of a child process the supervisor listens to
 */
export interface SupervisedProcess {
  readonly pid?: number | undefined;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export const nodeProcessControl: ProcessControl = {
  isAlive: (pid) => {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      if (isErrnoError(error) && error.code === 'ESRCH') {
        return false;
      }
      // EPERM: alive, owned by someone else
      if (isErrnoError(error) && error.code === 'EPERM') {
        return true;
      }
      throw error;
    }
  },
  kill: (pid, signal) => {
    process.kill(pid, signal);
  },
};

export async function writePidFile(file: string, pids: PidRecord): Promise<void> {
  await fs.writeFile(file, `${JSON.stringify(pids, null, 2)}\n`, 'utf-8');
}

export async function readPidFile(file: string): Promise<PidRecord> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isErrnoError(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
  const parsed: unknown = JSON.parse(content);
  const pids: PidRecord = {};
  if (typeof parsed === 'object' && parsed !== null) {
    for (const [name, pid] of Object.entries(parsed)) {
      if (typeof pid === 'number' && Number.isInteger(pid) && pid > 0) {
        pids[name] = pid;
      }
    }
  }
  return pids;
}

/**
 * Signal every recorded process that is still alive, then drop the PID file
 * @returns names of the processes that were signalled
 */
export async function stopRecordedProcesses(
  file: string,
  control: ProcessControl = nodeProcessControl,
  signal: NodeJS.Signals = 'SIGTERM'
): Promise<string[]> {
  const pids = await readPidFile(file);
  const stopped: string[] = [];
  for (const [name, pid] of Object.entries(pids)) {
    if (control.isAlive(pid)) {
      control.kill(pid, signal);
      stopped.push(name);
    }
  }
  await fs.rm(file, { force: true });
  return stopped;
}

export function devEndpoints(port: number): string[] {
  const base = `http://localhost:${String(port)}`;
  return [`${base}/${API_PREFIX}/`, `${base}/${API_PREFIX}/docs/`, `${base}/${API_PREFIX}/${ADMIN_PANEL_PATH}/`];
}

/**
 * Entry files resolved beside this module, so sources and build output both work
 */
function entryPoints(): { web: string; cli: string } {
  const extension = path.extname(__filename);
  return {
    web: path.resolve(__dirname, '..', '..', '..', 'web-server', 'src', `main${extension}`),
    cli: path.resolve(__dirname, '..', `main${extension}`),
  };
}

/**
 * Report the child's lifecycle; spawn failures arrive as `error` events, not throws
 * @returns the PID, when the child started
 */
export function superviseChild(name: string, child: SupervisedProcess, output: CliOutput): number | undefined {
  child.on('exit', (code, signal) => {
    output.line(`${name} exited (${signal ?? String(code)})`);
  });
  child.on('error', (error) => {
    output.error(`${name} failed: ${error.message}`);
  });
  if (child.pid === undefined) {
    output.error(`Could not start ${name}`);
    return undefined;
  }
  output.success(`Started ${name} (pid ${String(child.pid)})`);
  return child.pid;
}

export async function runDev(ctx: CliContext): Promise<number> {
  const { output } = ctx;

  const seeded = await setupInitialData(ctx);
  if (seeded !== 0) {
    return seeded;
  }

  const entries = entryPoints();
  const children: Array<{ name: string; child: ChildProcess }> = [
    { name: 'web', child: spawn(process.execPath, [...process.execArgv, entries.web], { cwd: ctx.cwd, env: ctx.env, stdio: 'inherit' }) },
    {
      name: 'worker',
      child: spawn(process.execPath, [...process.execArgv, entries.cli, 'worker'], { cwd: ctx.cwd, env: ctx.env, stdio: 'inherit' }),
    },
  ];

  const pids: PidRecord = {};
  for (const { name, child } of children) {
    const pid = superviseChild(name, child, output);
    if (pid !== undefined) {
      pids[name] = pid;
    }
  }

  const pidFile = path.join(ctx.cwd, PID_FILE_NAME);
  await writePidFile(pidFile, pids);

  output.line('Endpoints:');
  for (const endpoint of devEndpoints(getWebServerPort(ctx.env))) {
    output.line(`  ${endpoint}`);
  }
  output.line('Press Ctrl+C to stop');

  const signal = await ctx.waitForShutdown();
  output.line(`Received ${signal}, stopping child processes`);
  const stopped = await stopRecordedProcesses(pidFile);
  output.success(`Stopped: ${stopped.length > 0 ? stopped.join(', ') : 'nothing was running'}`);
  return 0;
}
