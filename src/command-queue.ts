// command-queue.ts
// Ordered command execution on a single dedicated worker loop.

import { AsyncLocalStorage } from "async_hooks";
import pino from "pino";
import { Command } from "./command";
import { getDefaultLogger } from "./config";
import { CommandReuseError, WorkerContextError, toError } from "./errors";

export interface CommandQueueOptions {
  name?: string;
  logger?: pino.Logger;
}

type Notification = "busy" | "success" | "fail";

/**
 * FIFO command queue. Any caller may commit; exactly one worker loop executes
 * commands, one at a time, in commit order. Subclasses implement
 * `process(command)`; whatever it throws is reported as that command's
 * failure and the loop carries on.
 */
export abstract class CommandQueue<C extends Command = Command> {
  public readonly name: string;
  protected readonly logger: pino.Logger;

  private readonly queue: C[] = [];
  private readonly workerContext = new AsyncLocalStorage<CommandQueue<C>>();
  private worker: Promise<void> | null = null;
  private wakeResolve: (() => void) | null = null;
  private stopRequested = false;
  // Commands a graceful stop still lets through.
  private drainBudget = 0;

  constructor(options: CommandQueueOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.logger = (options.logger ?? getDefaultLogger()).child({
      component: "command-queue",
      queue: this.name,
    });
  }

  protected abstract process(command: C): void | Promise<void>;

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Spawns the worker. Does nothing if it is already running, including while
   * a stop is still draining: await `stop()` before starting again, or the
   * queue ends up stopped and later commits are dropped.
   */
  start(): void {
    if (this.worker) {
      return;
    }
    this.stopRequested = false;
    this.drainBudget = 0;
    this.worker = this.workerContext.run(this, () => this.runWorker());
    this.logger.debug({ pending: this.queue.length }, "Worker started");
  }

  /**
   * Stops the worker and resolves once it has exited. A graceful stop first
   * runs every command queued at the time of the call; a hard stop finishes
   * only the command currently executing and drops the rest without handling
   * them or notifying their observers. Resolves immediately if no worker runs.
   *
   * Must not be called from inside the worker: it would wait for itself.
   */
  async stop(graceful = true): Promise<void> {
    if (this.isWorkerContext()) {
      throw new WorkerContextError(
        `${this.name}: stop() called from inside its own worker`
      );
    }
    const worker = this.worker;
    if (!worker) {
      return;
    }

    if (!this.stopRequested) {
      this.stopRequested = true;
      this.drainBudget = graceful ? this.queue.length : 0;
      this.logger.debug({ graceful, pending: this.queue.length }, "Stop requested");
    } else if (!graceful) {
      // Escalate a running graceful stop.
      this.drainBudget = 0;
    }

    this.wake();
    await worker;
  }

  isRunning(): boolean {
    return this.worker !== null;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /** True while executing inside this queue's worker. */
  isWorkerContext(): boolean {
    return this.workerContext.getStore() === this;
  }

  // ── Committing ─────────────────────────────────────────────────────────────

  /**
   * Appends the command and wakes the worker. Commands committed before
   * `start()` wait for it; commands committed once a stop was requested are
   * accepted but never executed. A command already committed, to this queue
   * or any other, is rejected with CommandReuseError.
   */
  commit<T extends C>(command: T): T {
    if (command.isCommitted()) {
      throw new CommandReuseError(command.id, command.kind);
    }
    command.markCommitted();
    if (this.stopRequested) {
      this.logger.debug(
        { command: command.describe() },
        "Queue is stopping, command will not be executed"
      );
      return command;
    }
    this.queue.push(command);
    this.wake();
    return command;
  }

  // ── Worker ─────────────────────────────────────────────────────────────────

  private wake(): void {
    const resolve = this.wakeResolve;
    this.wakeResolve = null;
    resolve?.();
  }

  private async runWorker(): Promise<void> {
    try {
      // Let start() return before the first command runs.
      await Promise.resolve();

      while (true) {
        if (this.stopRequested && this.drainBudget <= 0) {
          break;
        }

        const command = this.queue.shift();
        if (!command) {
          if (this.stopRequested) {
            break;
          }
          await new Promise<void>((resolve) => {
            this.wakeResolve = resolve;
          });
          continue;
        }

        if (this.stopRequested) {
          this.drainBudget--;
        }
        await this.execute(command);
      }
    } finally {
      const abandoned = this.queue.splice(0, this.queue.length);
      if (abandoned.length > 0) {
        this.logger.warn(
          { abandoned: abandoned.map((c) => c.describe()) },
          `Worker stopped with ${abandoned.length} unexecuted command(s)`
        );
      }
      this.wakeResolve = null;
      this.worker = null;
      this.logger.debug("Worker stopped");
    }
  }

  private async execute(command: C): Promise<void> {
    command.markBusy();
    this.notify(command, "busy");

    let failure: Error | null = null;
    try {
      await this.process(command);
    } catch (error) {
      failure = toError(error);
    }

    try {
      command.handle(failure);
    } catch (error) {
      this.logger.error(
        { command: command.describe(), err: toError(error) },
        "Command could not be marked handled"
      );
      return;
    }
    if (failure) {
      this.logger.warn(
        { command: command.describe(), err: failure },
        `Command failed: ${failure.message}`
      );
      this.notify(command, "fail", failure);
    } else {
      this.logger.debug({ command: command.describe() }, "Command succeeded");
      this.notify(command, "success");
    }
  }

  private notify(command: C, notification: Notification, reason?: Error): void {
    const observer = command.getObserver();
    if (!observer) {
      return;
    }
    try {
      switch (notification) {
        case "busy":
          observer.busy?.(command);
          break;
        case "success":
          observer.success?.(command);
          break;
        case "fail":
          observer.fail?.(command, reason ?? new Error("Unknown failure"));
          break;
      }
    } catch (error) {
      this.logger.error(
        { command: command.describe(), notification, err: toError(error) },
        "Command observer threw"
      );
    }
  }
}
