/**
 * TaskScheduler - cron-driven background jobs on node-cron
 *
 * Each task runs at most once at a time: a trigger that fires while the
 * previous run is still going is skipped and counted nowhere.
 */

import { EventEmitter } from 'events';
import cron, { type ScheduledTask } from 'node-cron';
import { NotFoundError, ValidationError } from '../../domain/repositories/errors.js';
import type { DomainLogger } from '../logging/domain-logger.js';
import { errorMessage } from '../logging/domain-logger.js';

export interface TaskDefinition {
  id: string;
  name: string;
  cronExpression: string;
  handler: () => Promise<unknown>;
  enabled: boolean;
}

export interface TaskStatus {
  id: string;
  name: string;
  cronExpression: string;
  enabled: boolean;
  isRunning: boolean;
  lastRun: string | null;
  lastError: string | null;
  runCount: number;
  successCount: number;
  failureCount: number;
  /** milliseconds */
  lastRunDuration?: number;
}

export interface TaskRunResult {
  taskId: string;
  success: boolean;
  skipped: boolean;
  duration: number;
  result?: unknown;
  error?: string;
}

export interface TaskSchedulerOptions {
  timezone?: string;
  logger?: DomainLogger;
}

export class TaskScheduler extends EventEmitter {
  private readonly tasks = new Map<string, TaskDefinition>();
  private readonly statuses = new Map<string, TaskStatus>();
  private readonly jobs = new Map<string, ScheduledTask>();
  private readonly running = new Set<string>();
  private started = false;

  constructor(private readonly options: TaskSchedulerOptions = {}) {
    super();
  }

  /**
   * @throws ValidationError for an invalid cron expression or a duplicate id
   */
  public register(task: TaskDefinition): void {
    if (!cron.validate(task.cronExpression)) {
      throw new ValidationError(`Invalid cron expression for task ${task.id}: ${task.cronExpression}`, [
        { field: 'cronExpression', message: 'Invalid cron expression', value: task.cronExpression },
      ]);
    }
    if (this.tasks.has(task.id)) {
      throw new ValidationError(`Task ${task.id} is already registered`, [{ field: 'id', message: 'Duplicate task id', value: task.id }]);
    }
    this.tasks.set(task.id, task);
    this.statuses.set(task.id, {
      id: task.id,
      name: task.name,
      cronExpression: task.cronExpression,
      enabled: task.enabled,
      isRunning: false,
      lastRun: null,
      lastError: null,
      runCount: 0,
      successCount: 0,
      failureCount: 0,
    });
    if (this.started && task.enabled) {
      this.schedule(task);
    }
  }

  public start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const task of this.tasks.values()) {
      if (task.enabled) {
        this.schedule(task);
      }
    }
    this.options.logger?.info?.(`Scheduler started with ${String(this.jobs.size)} tasks`);
    this.emit('started');
  }

  /**
   * Stop triggering; runs already in progress finish on their own
   */
  public stop(): void {
    for (const job of this.jobs.values()) {
      job.stop();
    }
    this.jobs.clear();
    if (this.started) {
      this.started = false;
      this.options.logger?.info?.('Scheduler stopped');
      this.emit('stopped');
    }
  }

  public get isStarted(): boolean {
    return this.started;
  }

  /**
   * Run a task once, outside its schedule
   * @throws NotFoundError for an unknown id
   */
  public async runNow(taskId: string): Promise<TaskRunResult> {
    const task = this.tasks.get(taskId);
    if (task === undefined) {
      throw new NotFoundError('Task', taskId, { message: `Unknown task: ${taskId}` });
    }
    return this.execute(task);
  }

  public getStatus(): TaskStatus[] {
    return [...this.statuses.values()].map((status) => ({ ...status, isRunning: this.running.has(status.id) }));
  }

  public getTaskStatus(taskId: string): TaskStatus | undefined {
    return this.getStatus().find((status) => status.id === taskId);
  }

  private schedule(task: TaskDefinition): void {
    const job = cron.schedule(
      task.cronExpression,
      () => {
        void this.execute(task);
      },
      { scheduled: true, timezone: this.options.timezone }
    );
    this.jobs.set(task.id, job);
  }

  /**
   * Handler failures end up in the task status instead of rejecting
   */
  private async execute(task: TaskDefinition): Promise<TaskRunResult> {
    if (this.running.has(task.id)) {
      this.options.logger?.warn?.(`Task ${task.id} is still running, skipping this trigger`);
      this.emit('taskSkipped', task.id);
      return { taskId: task.id, success: false, skipped: true, duration: 0 };
    }
    const status = this.requireStatus(task.id);
    this.running.add(task.id);
    const startedAt = Date.now();
    let outcome: TaskRunResult;
    try {
      const result = await task.handler();
      const duration = Date.now() - startedAt;
      status.successCount++;
      status.lastError = null;
      outcome = { taskId: task.id, success: true, skipped: false, duration, result };
      this.options.logger?.info?.(`Task ${task.id} finished in ${String(duration)}ms`, { result });
      this.emit('taskCompleted', outcome);
    } catch (error) {
      const duration = Date.now() - startedAt;
      const message = errorMessage(error);
      status.failureCount++;
      status.lastError = message;
      outcome = { taskId: task.id, success: false, skipped: false, duration, error: message };
      this.options.logger?.error?.(`Task ${task.id} failed: ${message}`);
      this.emit('taskFailed', outcome);
    } finally {
      this.running.delete(task.id);
    }
    status.runCount++;
    status.lastRun = new Date(startedAt).toISOString();
    status.lastRunDuration = outcome.duration;
    return outcome;
  }

  private requireStatus(taskId: string): TaskStatus {
    const status = this.statuses.get(taskId);
    if (status === undefined) {
      throw new NotFoundError('Task', taskId, { message: `Unknown task: ${taskId}` });
    }
    return status;
  }
}
