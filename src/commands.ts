// commands.ts
// The commands a processing network understands.

import * as path from "path";
import { Algorithm, AlgorithmOptions } from "./algorithm";
import { DataInject } from "./algorithms/data-inject";
import { Command, CommandObserver } from "./command";
import { Connection, Connector } from "./connector";
import { DataSetType } from "./data";
import { AlgorithmFailure } from "./errors";
import { Reader } from "./reader";

// ============================================================================
// ReadFile
// ============================================================================

/**
 * Loads a file with the given reader. The command owns a DataInject source
 * whose "Data" output is declared with the reader's type, so it can be
 * connected before the file is read. On success the source joins the network
 * carrying the loaded dataset.
 */
export class ReadFile extends Command {
  public readonly kind = "read-file";
  public readonly source: DataInject<unknown>;
  private result: unknown = undefined;

  constructor(
    public readonly fileName: string,
    public readonly reader: Reader | null,
    observer: CommandObserver<ReadFile> | null = null,
    options: AlgorithmOptions = {}
  ) {
    super(observer);
    this.source = new DataInject<unknown>(
      reader ? reader.produces : DataSetType,
      path.basename(fileName),
      options
    );
  }

  getResult(): unknown {
    return this.result;
  }

  setResult(result: unknown): void {
    this.result = result;
  }

  describe(): string {
    return `${this.kind} ${this.fileName}`;
  }
}

// ============================================================================
// AddAlgorithm
// ============================================================================

export class AddAlgorithm extends Command {
  public readonly kind = "add-algorithm";

  constructor(
    public readonly algorithm: Algorithm,
    observer: CommandObserver<AddAlgorithm> | null = null
  ) {
    super(observer);
  }

  describe(): string {
    return `${this.kind} ${this.algorithm.name}`;
  }
}

// ============================================================================
// Connect
// ============================================================================

export type ConnectEndpoints =
  | {
      by: "name";
      source: Algorithm;
      sourceConnector: string;
      target: Algorithm;
      targetConnector: string;
    }
  | { by: "connector"; source: Connector; target: Connector };

/**
 * Connects an output to an input. Connector names are resolved when the
 * command runs, so the algorithms may still be waiting in the queue when the
 * command is created.
 */
export class Connect extends Command {
  public readonly kind = "connect";
  private connection: Connection | null = null;

  private constructor(
    public readonly endpoints: ConnectEndpoints,
    observer: CommandObserver<Connect> | null
  ) {
    super(observer);
  }

  static byName(
    source: Algorithm,
    sourceConnector: string,
    target: Algorithm,
    targetConnector: string,
    observer: CommandObserver<Connect> | null = null
  ): Connect {
    return new Connect({ by: "name", source, sourceConnector, target, targetConnector }, observer);
  }

  static byConnector(
    source: Connector,
    target: Connector,
    observer: CommandObserver<Connect> | null = null
  ): Connect {
    return new Connect({ by: "connector", source, target }, observer);
  }

  /** The edge this command created or found; null until it succeeded. */
  getConnection(): Connection | null {
    return this.connection;
  }

  setConnection(connection: Connection): void {
    this.connection = connection;
  }

  describe(): string {
    const e = this.endpoints;
    return e.by === "name"
      ? `${this.kind} ${e.source.name}:${e.sourceConnector} -> ${e.target.name}:${e.targetConnector}`
      : `${this.kind} ${e.source} -> ${e.target}`;
  }
}

// ============================================================================
// RunNetwork
// ============================================================================

/** Re-runs every active algorithm once, in the order they were added. */
export class RunNetwork extends Command {
  public readonly kind = "run-network";
  private executed: Algorithm[] = [];
  private failures: AlgorithmFailure[] = [];

  constructor(observer: CommandObserver<RunNetwork> | null = null) {
    super(observer);
  }

  getExecuted(): readonly Algorithm[] {
    return this.executed;
  }

  getFailures(): readonly AlgorithmFailure[] {
    return this.failures;
  }

  recordExecution(algorithm: Algorithm, failure: AlgorithmFailure | null): void {
    this.executed.push(algorithm);
    if (failure) {
      this.failures.push(failure);
    }
  }
}

export type NetworkCommand = ReadFile | AddAlgorithm | Connect | RunNetwork;
