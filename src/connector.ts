// connector.ts
// Typed, named ports and the edges between them.

import { DataType } from "./data";
import {
  ConnectorDirectionError,
  ConnectorTypeMismatchError,
} from "./errors";

export type ConnectorDirection = "input" | "output";

export interface ConnectorOwner {
  readonly id: string;
  readonly name: string;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

// ============================================================================
// Connector
// ============================================================================

/**
 * A port on an algorithm. Outputs hold the value their algorithm published
 * last; inputs hold no value of their own and read through the output that
 * feeds them.
 */
export class Connector<T = unknown> {
  private value: T | undefined = undefined;
  private source: Connector<T> | null = null;

  constructor(
    public readonly owner: ConnectorOwner,
    public readonly name: string,
    public readonly direction: ConnectorDirection,
    public readonly type: DataType<T>,
    public readonly description: string = ""
  ) {}

  isInput(): boolean {
    return this.direction === "input";
  }

  isOutput(): boolean {
    return this.direction === "output";
  }

  getData(): T | undefined {
    if (this.direction === "input") {
      return this.source?.getData();
    }
    return this.value;
  }

  hasData(): boolean {
    return this.getData() !== undefined;
  }

  /**
   * Publish a value. Only the owning algorithm's `process()` may call this,
   * and only on outputs.
   */
  setData(value: T): void {
    if (this.direction !== "output") {
      throw new ConnectorDirectionError(
        `cannot publish to input "${this.name}" of "${this.owner.name}"`
      );
    }
    if (!this.type.is(value)) {
      throw new ConnectorTypeMismatchError(
        this.type.name,
        describeValue(value),
        `output "${this.name}" of "${this.owner.name}"`
      );
    }
    this.value = value;
  }

  clear(): void {
    this.value = undefined;
  }

  /** The output feeding this input, if any. */
  getSource(): Connector<T> | null {
    return this.source;
  }

  // Edge bookkeeping; the processing network calls these from its worker.
  attachSource(source: Connector<T>): void {
    this.source = source;
  }

  detachSource(): void {
    this.source = null;
  }

  toString(): string {
    return `${this.owner.name}:${this.name}`;
  }
}

// ============================================================================
// Connection
// ============================================================================

/**
 * Directed edge from an output connector to an input connector. Construction
 * validates direction and type compatibility and throws on mismatch; it does
 * not touch either connector.
 */
export class Connection<T = unknown> {
  constructor(
    public readonly source: Connector<T>,
    public readonly target: Connector<T>
  ) {
    if (!source.isOutput()) {
      throw new ConnectorDirectionError(
        `connection source ${source} is an input, expected an output`
      );
    }
    if (!target.isInput()) {
      throw new ConnectorDirectionError(
        `connection target ${target} is an output, expected an input`
      );
    }
    if (!source.type.isAssignableTo(target.type)) {
      throw new ConnectorTypeMismatchError(
        target.type.name,
        source.type.name,
        `cannot connect ${source} to ${target}`
      );
    }
  }

  get sourceAlgorithm(): ConnectorOwner {
    return this.source.owner;
  }

  get targetAlgorithm(): ConnectorOwner {
    return this.target.owner;
  }

  matches(source: Connector<T>, target: Connector<T>): boolean {
    return this.source === source && this.target === target;
  }

  isLive(): boolean {
    return this.target.getSource() === this.source;
  }

  toString(): string {
    return `${this.source} -> ${this.target}`;
  }
}
