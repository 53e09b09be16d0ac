// testing.ts
// Utilities for verifiable network tests.

import pino from "pino";
import { Algorithm, AlgorithmOptions } from "./algorithm";
import { Command, CommandObserver } from "./command";
import { Connector } from "./connector";
import { DataType } from "./data";

export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * One input "in", one output "out". Records what it saw on every run and
 * publishes whatever `transform` returns (nothing for undefined).
 */
export class TestAlgorithm<TIn = unknown, TOut = unknown> extends Algorithm {
  public readonly input: Connector<TIn>;
  public readonly output: Connector<TOut>;
  public receivedInputs: (TIn | undefined)[] = [];
  public runs = 0;

  constructor(
    name: string,
    types: { input: DataType<TIn>; output: DataType<TOut> },
    private readonly transform?: (input: TIn | undefined) => TOut | undefined | Promise<TOut | undefined>,
    options: AlgorithmOptions = {}
  ) {
    super(name, "Test algorithm", { logger: options.logger ?? createTestLogger() });
    this.input = this.addInput("in", types.input);
    this.output = this.addOutput("out", types.output);
  }

  async process(): Promise<void> {
    this.runs++;
    const value = this.input.getData();
    this.receivedInputs.push(value);
    if (!this.transform) {
      return;
    }
    const result = await this.transform(value);
    if (result !== undefined) {
      this.output.setData(result);
    }
  }

  reset(): void {
    this.receivedInputs = [];
    this.runs = 0;
  }

  assertReceived(expected: (TIn | undefined)[]): void {
    if (JSON.stringify(this.receivedInputs) !== JSON.stringify(expected)) {
      throw new Error(
        `Expected inputs ${JSON.stringify(expected)}, got ${JSON.stringify(this.receivedInputs)}`
      );
    }
  }
}

/** Appends "<label>:<event>" to a shared log for every notification. */
export class RecordingObserver implements CommandObserver {
  public failures: Error[] = [];

  constructor(
    private readonly log: string[],
    private readonly label: string
  ) {}

  busy(_command: Command): void {
    this.log.push(`${this.label}:busy`);
  }

  success(_command: Command): void {
    this.log.push(`${this.label}:success`);
  }

  fail(_command: Command, reason: Error): void {
    this.failures.push(reason);
    this.log.push(`${this.label}:fail`);
  }
}
