/**
 * worker and run-task
 */

import { TaskScheduler, createDefaultTasks, type CoreServices, type DomainLogger } from '@contractor-connect/core';
import { createCliLogger } from '../output.js';
import { withServices, type CliContext } from '../context.js';

export function createScheduler(services: CoreServices, logger?: DomainLogger): TaskScheduler {
  const scheduler = new TaskScheduler({ logger });
  for (const task of createDefaultTasks(services)) {
    scheduler.register(task);
  }
  return scheduler;
}

/**
 * Run the scheduled tasks until SIGINT or SIGTERM
 */
export function runWorker(ctx: CliContext): Promise<number> {
  return withServices(ctx, async (services, settings) => {
    const { output } = ctx;
    const scheduler = createScheduler(services, createCliLogger(settings.debug));

    scheduler.start();
    const tasks = scheduler.getStatus();
    output.success(`Worker started with ${String(tasks.length)} tasks`);
    for (const task of tasks) {
      output.line(`  ${task.id} (${task.cronExpression})`);
    }

    const signal = await ctx.waitForShutdown();
    output.line(`Received ${signal}, stopping`);
    scheduler.stop();
    output.success('Worker stopped');
    return 0;
  });
}

export function runTask(ctx: CliContext, taskId: string): Promise<number> {
  return withServices(ctx, async (services, settings) => {
    const { output } = ctx;
    const scheduler = createScheduler(services, createCliLogger(settings.debug));

    const result = await scheduler.runNow(taskId);
    if (result.success) {
      output.success(`Task ${taskId} finished in ${String(result.duration)}ms`);
    } else {
      output.error(`Task ${taskId} failed: ${result.error ?? 'unknown error'}`);
    }

    const status = scheduler.getTaskStatus(taskId);
    if (status !== undefined) {
      output.line(
        `Runs: ${String(status.runCount)}, successes: ${String(status.successCount)}, failures: ${String(status.failureCount)}`
      );
    }
    return result.success ? 0 : 1;
  });
}
