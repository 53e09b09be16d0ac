// command.ts
// Queued units of work and the observer contract that reports on them.

import crypto from "crypto";

export type CommandState = "pending" | "handled";

export type CommandOutcome =
  | { status: "succeeded" }
  | { status: "failed"; reason: Error };

/**
 * Notified from inside the worker. `busy` fires when execution starts;
 * exactly one of `success` / `fail` fires once the command's effects are
 * applied. Abandoned commands notify nothing.
 */
export interface CommandObserver<C extends Command = Command> {
  busy?(command: C): void;
  success?(command: C): void;
  fail?(command: C, reason: Error): void;
}

export function observe<C extends Command = Command>(callbacks: {
  busy?: (command: C) => void;
  success?: (command: C) => void;
  fail?: (command: C, reason: Error) => void;
}): CommandObserver<C> {
  return {
    busy: callbacks.busy,
    success: callbacks.success,
    fail: callbacks.fail,
  };
}

export abstract class Command {
  public readonly id: string;
  public abstract readonly kind: string;

  private state: CommandState = "pending";
  private busy = false;
  private committed = false;
  private failure: Error | null = null;
  private waiters: Array<(outcome: CommandOutcome) => void> = [];

  constructor(private readonly observer: CommandObserver | null = null) {
    this.id = `command_${crypto.randomUUID()}`;
  }

  getState(): CommandState {
    return this.state;
  }

  isHandled(): boolean {
    return this.state === "handled";
  }

  isBusy(): boolean {
    return this.busy;
  }

  isSuccessful(): boolean {
    return this.state === "handled" && this.failure === null;
  }

  getFailure(): Error | null {
    return this.failure;
  }

  getObserver(): CommandObserver | null {
    return this.observer;
  }

  /**
   * Resolves once the command is handled. Never settles for commands a hard
   * stop abandoned.
   */
  wait(): Promise<CommandOutcome> {
    if (this.state === "handled") {
      return Promise.resolve(this.outcome());
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  isCommitted(): boolean {
    return this.committed;
  }

  /** Called by the queue that accepted the command. A command is committed once. */
  markCommitted(): void {
    this.committed = true;
  }

  /** Called by the queue when execution begins. */
  markBusy(): void {
    this.busy = true;
  }

  /**
   * Pending -> handled. Called exactly once, by the queue that executed the
   * command.
   */
  handle(failure: Error | null = null): void {
    if (this.state === "handled") {
      throw new Error(`Command ${this.id} (${this.kind}) was already handled`);
    }
    this.state = "handled";
    this.busy = false;
    this.failure = failure;

    const outcome = this.outcome();
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve(outcome);
    }
  }

  private outcome(): CommandOutcome {
    return this.failure ? { status: "failed", reason: this.failure } : { status: "succeeded" };
  }

  describe(): string {
    return this.kind;
  }
}
