// data-inject.ts
// Source node that publishes externally supplied data, e.g. a file a reader loaded.

import { Algorithm, AlgorithmOptions } from "../algorithm";
import { Connector } from "../connector";
import { DataType } from "../data";

export class DataInject<T> extends Algorithm {
  public readonly output: Connector<T>;
  private data: T | undefined = undefined;

  constructor(type: DataType<T>, name = "Data Inject", options: AlgorithmOptions = {}) {
    super(name, "Publishes injected data on its single output.", options);
    this.output = this.addOutput("Data", type, "The injected data.");
  }

  /** Publishes immediately. Call from the network worker only. */
  inject(data: T): void {
    this.output.setData(data);
    this.data = data;
  }

  getInjected(): T | undefined {
    return this.data;
  }

  process(): void {
    if (this.data !== undefined) {
      this.output.setData(this.data);
    }
  }
}
