// algorithm.ts
// Base classes for network nodes.

import crypto from "crypto";
import pino from "pino";
import { getDefaultLogger } from "./config";
import { Connector, ConnectorDirection } from "./connector";
import { BoundingBox, DataType } from "./data";
import { DuplicateConnectorError } from "./errors";
import { RenderRequest, Visualization, View } from "./visualization";

export interface AlgorithmOptions {
  logger?: pino.Logger;
}

// ============================================================================
// Algorithm
// ============================================================================

/**
 * A node of the processing network. Connectors are declared in the
 * constructor and never change afterwards. `process()` is only ever invoked by
 * the network's worker; it reads the inputs and publishes to the outputs.
 */
export abstract class Algorithm {
  public readonly id: string;
  protected readonly logger: pino.Logger;

  private readonly inputs = new Map<string, Connector>();
  private readonly outputs = new Map<string, Connector>();
  private active = true;
  private owner: object | null = null;

  // Set by subclasses that can render; read once when the node is added.
  protected visualization: Visualization | undefined = undefined;

  constructor(
    public readonly name: string,
    public readonly description: string = "",
    options: AlgorithmOptions = {}
  ) {
    this.id = `algorithm_${crypto.randomUUID()}`;
    this.logger = (options.logger ?? getDefaultLogger()).child({
      algorithm: name,
    });
  }

  abstract process(): void | Promise<void>;

  protected addInput<T>(name: string, type: DataType<T>, description = ""): Connector<T> {
    return this.addConnector(this.inputs, name, "input", type, description);
  }

  protected addOutput<T>(name: string, type: DataType<T>, description = ""): Connector<T> {
    return this.addConnector(this.outputs, name, "output", type, description);
  }

  private addConnector<T>(
    registry: Map<string, Connector>,
    name: string,
    direction: ConnectorDirection,
    type: DataType<T>,
    description: string
  ): Connector<T> {
    if (registry.has(name)) {
      throw new DuplicateConnectorError(this.name, name, direction);
    }
    const connector = new Connector<T>(this, name, direction, type, description);
    registry.set(name, connector);
    return connector;
  }

  getInput(name: string): Connector | undefined {
    return this.inputs.get(name);
  }

  getOutput(name: string): Connector | undefined {
    return this.outputs.get(name);
  }

  getInputs(): Connector[] {
    return Array.from(this.inputs.values());
  }

  getOutputs(): Connector[] {
    return Array.from(this.outputs.values());
  }

  getVisualization(): Visualization | undefined {
    return this.visualization;
  }

  isActive(): boolean {
    return this.active;
  }

  /** Inactive algorithms are skipped by network runs and by the render loop. */
  setActive(active: boolean): this {
    this.active = active;
    return this;
  }

  /**
   * Records the network that owns this algorithm. Returns false when another
   * owner already claimed it.
   */
  claim(owner: object): boolean {
    if (this.owner !== null && this.owner !== owner) {
      return false;
    }
    this.owner = owner;
    return true;
  }

  isOwnedBy(owner: object): boolean {
    return this.owner === owner;
  }

  toString(): string {
    return this.name;
  }
}

// ============================================================================
// Visualization Algorithm
// ============================================================================

/**
 * An algorithm that also renders. `process()` runs on the worker, the
 * Visualization methods on the render loop; the two sides meet only through
 * `renderRequest` and whatever SnapshotSlot the subclass publishes into.
 */
export abstract class VisualizationAlgorithm extends Algorithm implements Visualization {
  protected readonly renderRequest = new RenderRequest();

  constructor(name: string, description = "", options: AlgorithmOptions = {}) {
    super(name, description, options);
    this.visualization = this;
  }

  abstract prepare(): void | Promise<void>;
  abstract render(view: View): void | Promise<void>;
  abstract finalize(): void | Promise<void>;
  abstract getBoundingBox(): BoundingBox;

  // Nothing to refresh by default.
  update(_view: View): void | Promise<void> {}

  requestRender(): void {
    this.renderRequest.request();
  }

  isRenderingRequested(): boolean {
    return this.renderRequest.isRequested();
  }
}
