import { errorMessage } from '../lib/daikin/errors';
import type { Logger } from '../types';

export interface PollTask {
  id: string;
  interval: number; // milliseconds
  /** May resolve to a delay (ms) that replaces the interval for the next run only. */
  run: () => Promise<number | void> | number | void;
  immediate?: boolean;
}

export interface PollSchedulerOptions {
  logger?: Logger;
  jitter?: number;
}

interface ScheduledTask extends PollTask {
  timeout?: NodeJS.Timeout;
  active?: Promise<void>;
}

/**
 * Runs asynchronous poll tasks with independent intervals.
 * Each task is scheduled using setTimeout so intervals can change between runs
 * and stopping the scheduler leaves no timers behind. A task never overlaps itself.
 */
export class PollScheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly logger?: Logger;
  private readonly jitter: number;
  private running = false;

  constructor(options: PollSchedulerOptions = {}) {
    this.logger = options.logger;
    this.jitter = options.jitter ?? 0;
  }

  register(task: PollTask): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Poll task with id "${task.id}" already registered`);
    }

    const state: ScheduledTask = { ...task };
    this.tasks.set(task.id, state);

    if (this.running) {
      this.schedule(state, (task.immediate ?? true) ? 0 : undefined);
    }
  }

  /** Runs a task now, outside its timer. Resolves once the run settles. */
  async trigger(id: string): Promise<void> {
    const task = this.tasks.get(id);
    if (!task) {
      throw new Error(`Unknown poll task: ${id}`);
    }
    if (task.active) {
      return task.active;
    }

    this.clearTimeout(task);
    return this.execute(task);
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    for (const task of this.tasks.values()) {
      this.schedule(task, (task.immediate ?? true) ? 0 : undefined);
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const task of this.tasks.values()) {
      this.clearTimeout(task);
    }
  }

  unregister(id: string): void {
    const task = this.tasks.get(id);
    if (!task) {
      return;
    }

    this.clearTimeout(task);
    this.tasks.delete(id);
  }

  private schedule(task: ScheduledTask, delayOverride?: number): void {
    if (!this.running || this.tasks.get(task.id) !== task) {
      return;
    }

    const delay = delayOverride ?? this.calculateDelay(task.interval);
    task.timeout = setTimeout(() => {
      task.timeout = undefined;
      void this.execute(task);
    }, delay);
  }

  private execute(task: ScheduledTask): Promise<void> {
    if (task.active) {
      return task.active;
    }

    task.active = this.runOnce(task).finally(() => {
      task.active = undefined;
    });
    return task.active;
  }

  private async runOnce(task: ScheduledTask): Promise<void> {
    let nextDelay: number | undefined;
    try {
      const result = await task.run();
      if (typeof result === 'number' && Number.isFinite(result) && result >= 0) {
        nextDelay = result;
      }
    } catch (error) {
      this.logger?.('[PollScheduler] Poll task "%s" failed: %s', task.id, errorMessage(error));
    }

    this.clearTimeout(task);
    this.schedule(task, nextDelay);
  }

  private calculateDelay(interval: number): number {
    if (this.jitter <= 0) {
      return interval;
    }

    const jitterValue = Math.floor(Math.random() * this.jitter);
    return interval + jitterValue;
  }

  private clearTimeout(task: ScheduledTask): void {
    if (task.timeout) {
      clearTimeout(task.timeout);
      task.timeout = undefined;
    }
  }
}

export default PollScheduler;
