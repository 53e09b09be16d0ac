// strategies.ts
// Switchable groups of algorithms. Only one strategy of a group is active at a time.

import pino from "pino";
import { Algorithm } from "./algorithm";
import { Connect, RunNetwork } from "./commands";
import { getDefaultLogger } from "./config";
import { ProcessingNetwork } from "./processing-network";

export class AlgorithmStrategy {
  private readonly algorithms: Algorithm[] = [];
  private network: ProcessingNetwork | null = null;
  private active = true;

  constructor(public readonly name: string) {}

  addAlgorithm<A extends Algorithm>(algorithm: A): A {
    if (!this.algorithms.includes(algorithm)) {
      this.algorithms.push(algorithm);
      algorithm.setActive(this.active);
    }
    return algorithm;
  }

  getAlgorithms(): readonly Algorithm[] {
    return this.algorithms;
  }

  /** Commits an AddAlgorithm command for every member. */
  prepareProcessingNetwork(network: ProcessingNetwork): void {
    this.network = network;
    for (const algorithm of this.algorithms) {
      network.addAlgorithm(algorithm);
    }
  }

  /**
   * Connects `from`'s output to the input named `inputName` of every member
   * that has one. Needs prepareProcessingNetwork() first; returns the
   * committed commands.
   */
  connect(from: Algorithm, outputName: string, inputName: string): Connect[] {
    const network = this.network;
    if (!network) {
      return [];
    }
    return this.algorithms
      .filter((algorithm) => algorithm.getInput(inputName) !== undefined)
      .map((algorithm) => network.connectAlgorithms(from, outputName, algorithm, inputName));
  }

  isActive(): boolean {
    return this.active;
  }

  setActive(active: boolean): void {
    this.active = active;
    for (const algorithm of this.algorithms) {
      algorithm.setActive(active);
    }
  }
}

/**
 * Ordered set of strategies. Selecting one deactivates the others and asks
 * the network, if one has been handed over, to re-run.
 */
export class AlgorithmStrategies {
  private readonly strategies: AlgorithmStrategy[] = [];
  private readonly logger: pino.Logger;
  private current = -1;

  constructor(
    private network: ProcessingNetwork | null = null,
    options: { logger?: pino.Logger } = {}
  ) {
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: "strategies" });
  }

  /** The network may not exist yet while the application starts up. */
  setNetwork(network: ProcessingNetwork | null): void {
    this.network = network;
  }

  addStrategy(strategy: AlgorithmStrategy): AlgorithmStrategy {
    this.strategies.push(strategy);
    this.select(this.current < 0 ? 0 : this.current);
    return strategy;
  }

  getStrategies(): readonly AlgorithmStrategy[] {
    return this.strategies;
  }

  getCurrentIndex(): number {
    return this.current;
  }

  getCurrent(): AlgorithmStrategy | undefined {
    return this.strategies[this.current];
  }

  /** Returns the RunNetwork command it committed, or null without a network. */
  select(index: number): RunNetwork | null {
    if (index < 0 || index >= this.strategies.length) {
      throw new RangeError(`No strategy at index ${index}`);
    }
    this.current = index;
    this.strategies.forEach((strategy, i) => strategy.setActive(i === index));
    this.logger.debug({ strategy: this.strategies[index].name }, "Strategy selected");

    // Activation changed; re-run. No network yet means nothing to re-run.
    return this.network ? this.network.runNetwork() : null;
  }

  prepareProcessingNetwork(): void {
    const network = this.network;
    if (!network) {
      return;
    }
    for (const strategy of this.strategies) {
      strategy.prepareProcessingNetwork(network);
    }
  }

  connectToAll(from: Algorithm, outputName: string, inputName: string): Connect[] {
    return this.strategies.flatMap((strategy) => strategy.connect(from, outputName, inputName));
  }
}
