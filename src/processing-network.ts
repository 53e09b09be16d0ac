// processing-network.ts
// The data-flow graph and the command queue that owns it.

import { Algorithm } from "./algorithm";
import { CommandObserver } from "./command";
import { CommandQueue, CommandQueueOptions } from "./command-queue";
import {
  AddAlgorithm,
  Connect,
  ConnectEndpoints,
  NetworkCommand,
  ReadFile,
  RunNetwork,
} from "./commands";
import { loadConfig } from "./config";
import { Connection, Connector } from "./connector";
import {
  AlgorithmFailure,
  ConnectorNotFoundError,
  ForeignAlgorithmError,
  InputAlreadyConnectedError,
  NetworkRunError,
  ReaderNotFoundError,
  WorkerContextError,
  toError,
} from "./errors";
import { ObjReader } from "./obj-reader";
import { Reader } from "./reader";
import { Visualization } from "./visualization";

/** A node plus its rendering facet, captured once when the node is added. */
export interface NetworkNode {
  readonly algorithm: Algorithm;
  readonly visualization: Visualization | undefined;
}

export interface ProcessingNetworkOptions extends CommandQueueOptions {
  /** Defaults to a single OBJ reader. */
  readers?: Reader[];
}

/**
 * Container controlling a data-flow network. All mutation happens on the
 * queue's worker through commands; the convenience methods below only commit
 * the matching command and return it.
 *
 * Node and edge lists are replaced, never modified in place, so a snapshot
 * taken by any caller stays consistent however long it is used.
 */
export class ProcessingNetwork extends CommandQueue<NetworkCommand> {
  private readonly readers: Reader[];
  private nodes: readonly NetworkNode[] = Object.freeze([]);
  private connections: readonly Connection[] = Object.freeze([]);

  constructor(options: ProcessingNetworkOptions = {}) {
    super({ name: options.name ?? loadConfig().networkName, logger: options.logger });
    this.readers = options.readers ? [...options.readers] : [new ObjReader()];
  }

  // ── Readers ────────────────────────────────────────────────────────────────

  registerReader(reader: Reader): this {
    this.readers.push(reader);
    return this;
  }

  /** First registered reader that accepts the file name, or null. */
  findReader(fileName: string): Reader | null {
    return this.readers.find((reader) => reader.canLoad(fileName)) ?? null;
  }

  // ── Convenience Commands ───────────────────────────────────────────────────

  /**
   * Commits `new ReadFile(fileName, reader, observer)`. The reader is chosen
   * now, since it types the command's source; readers registered later are
   * not consulted for this command.
   */
  loadFile(fileName: string, observer: CommandObserver<ReadFile> | null = null): ReadFile {
    return this.commit(
      new ReadFile(fileName, this.findReader(fileName), observer, { logger: this.logger })
    );
  }

  /** Commits `new AddAlgorithm(algorithm, observer)`. */
  addAlgorithm(
    algorithm: Algorithm,
    observer: CommandObserver<AddAlgorithm> | null = null
  ): AddAlgorithm {
    return this.commit(new AddAlgorithm(algorithm, observer));
  }

  /**
   * Commits a Connect command. The command fails, rather than this call, if
   * an argument is invalid; the algorithms may still be waiting in the queue.
   */
  connectAlgorithms(
    from: Algorithm,
    fromConnector: string,
    to: Algorithm,
    toConnector: string,
    observer?: CommandObserver<Connect> | null
  ): Connect;
  connectAlgorithms(
    from: Connector,
    to: Connector,
    observer?: CommandObserver<Connect> | null
  ): Connect;
  connectAlgorithms(
    from: Algorithm | Connector,
    fromConnectorOrTo: string | Connector,
    toOrObserver?: Algorithm | CommandObserver<Connect> | null,
    toConnector?: string,
    observer: CommandObserver<Connect> | null = null
  ): Connect {
    if (
      from instanceof Algorithm &&
      typeof fromConnectorOrTo === "string" &&
      toOrObserver instanceof Algorithm &&
      toConnector !== undefined
    ) {
      return this.commit(
        Connect.byName(from, fromConnectorOrTo, toOrObserver, toConnector, observer)
      );
    }
    if (
      from instanceof Connector &&
      fromConnectorOrTo instanceof Connector &&
      !(toOrObserver instanceof Algorithm)
    ) {
      return this.commit(Connect.byConnector(from, fromConnectorOrTo, toOrObserver ?? null));
    }
    throw new TypeError("connectAlgorithms: expected (algorithm, name, algorithm, name) or (connector, connector)");
  }

  /**
   * Commits a RunNetwork command. Re-runs every node in insertion order; not
   * dependency aware.
   */
  runNetwork(observer: CommandObserver<RunNetwork> | null = null): RunNetwork {
    return this.commit(new RunNetwork(observer));
  }

  // ── Snapshots ──────────────────────────────────────────────────────────────

  /** Calls the visitor for every node present when the call started. */
  visitAlgorithms(visitor: (algorithm: Algorithm) => void): void {
    const snapshot = this.nodes;
    for (const node of snapshot) {
      visitor(node.algorithm);
    }
  }

  /** Like visitAlgorithms, restricted to nodes that can render. */
  visitVisualizations(visitor: (visualization: Visualization, algorithm: Algorithm) => void): void {
    const snapshot = this.nodes;
    for (const node of snapshot) {
      if (node.visualization) {
        visitor(node.visualization, node.algorithm);
      }
    }
  }

  getNodes(): readonly NetworkNode[] {
    return this.nodes;
  }

  getAlgorithms(): Algorithm[] {
    return this.nodes.map((node) => node.algorithm);
  }

  getConnections(): readonly Connection[] {
    return this.connections;
  }

  hasAlgorithm(algorithm: Algorithm): boolean {
    return this.nodes.some((node) => node.algorithm === algorithm);
  }

  get algorithmCount(): number {
    return this.nodes.length;
  }

  get connectionCount(): number {
    return this.connections.length;
  }

  // ── Command Processing ─────────────────────────────────────────────────────

  protected async process(command: NetworkCommand): Promise<void> {
    switch (command.kind) {
      case "read-file":
        return this.processReadFile(command);
      case "add-algorithm":
        this.addNetworkNode(command.algorithm);
        return;
      case "connect":
        this.processConnect(command);
        return;
      case "run-network":
        return this.runNetworkImpl(command);
      default: {
        const unhandled: never = command;
        throw new Error(`Unknown command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async processReadFile(command: ReadFile): Promise<void> {
    if (!command.reader) {
      throw new ReaderNotFoundError(command.fileName);
    }
    this.logger.debug({ file: command.fileName, reader: command.reader.name }, "Loading file");
    const data = await command.reader.load(command.fileName);

    // inject() validates the type before anything is added.
    command.source.inject(data);
    this.addNetworkNode(command.source);
    command.setResult(data);
  }

  private processConnect(command: Connect): void {
    const { source, target } = this.resolveEndpoints(command.endpoints);
    // Throws on direction or type mismatch.
    const connection = new Connection(source, target);
    command.setConnection(this.addNetworkNodeEdge(connection));
  }

  private resolveEndpoints(endpoints: ConnectEndpoints): { source: Connector; target: Connector } {
    if (endpoints.by === "connector") {
      return { source: endpoints.source, target: endpoints.target };
    }
    const source = endpoints.source.getOutput(endpoints.sourceConnector);
    if (!source) {
      throw new ConnectorNotFoundError(endpoints.source.name, endpoints.sourceConnector, "output");
    }
    const target = endpoints.target.getInput(endpoints.targetConnector);
    if (!target) {
      throw new ConnectorNotFoundError(endpoints.target.name, endpoints.targetConnector, "input");
    }
    return { source, target };
  }

  /**
   * Re-runs the whole network in insertion order. A failing node does not
   * stop the pass; all failures are reported together afterwards.
   */
  protected async runNetworkImpl(command: RunNetwork): Promise<void> {
    const snapshot = this.nodes;
    for (const node of snapshot) {
      const algorithm = node.algorithm;
      if (!algorithm.isActive()) {
        continue;
      }

      let failure: AlgorithmFailure | null = null;
      try {
        await algorithm.process();
      } catch (error) {
        failure = {
          error: toError(error),
          algorithmId: algorithm.id,
          algorithmName: algorithm.name,
          timestamp: Date.now(),
        };
        this.logger.warn(
          { algorithm: algorithm.name, err: failure.error },
          `Algorithm ${algorithm.name} failed during network run`
        );
      }
      command.recordExecution(algorithm, failure);
    }

    const failures = command.getFailures();
    if (failures.length > 0) {
      throw new NetworkRunError(failures);
    }
  }

  // ── Graph Mutation (worker only) ───────────────────────────────────────────

  private assertWorker(operation: string): void {
    if (!this.isWorkerContext()) {
      throw new WorkerContextError(
        `${operation} may only be called by the network worker; commit a command instead`
      );
    }
  }

  /**
   * Adds the algorithm unless it is already present. An algorithm owned by
   * another network is rejected.
   *
   * Not thread-safe: worker only.
   */
  protected addNetworkNode(algorithm: Algorithm): void {
    this.assertWorker("addNetworkNode");
    if (this.hasAlgorithm(algorithm)) {
      return;
    }
    if (!algorithm.claim(this)) {
      throw new ForeignAlgorithmError(algorithm.name);
    }
    const node: NetworkNode = Object.freeze({
      algorithm,
      visualization: algorithm.getVisualization(),
    });
    this.nodes = Object.freeze([...this.nodes, node]);
    this.logger.debug({ algorithm: algorithm.name, nodes: this.nodes.length }, "Algorithm added");
  }

  /**
   * Adds the edge and makes it live. An identical edge already present is
   * returned instead. Connectors of algorithms outside the network are fine;
   * that is how data is tapped out of it. Each input takes one writer only.
   *
   * Not thread-safe: worker only.
   */
  protected addNetworkNodeEdge(connection: Connection): Connection {
    this.assertWorker("addNetworkNodeEdge");
    const existing = this.connections.find((c) =>
      c.matches(connection.source, connection.target)
    );
    if (existing) {
      return existing;
    }

    const currentSource = connection.target.getSource();
    if (currentSource && currentSource !== connection.source) {
      throw new InputAlreadyConnectedError(
        connection.target.owner.name,
        connection.target.name
      );
    }

    connection.target.attachSource(connection.source);
    this.connections = Object.freeze([...this.connections, connection]);
    this.logger.debug({ connection: connection.toString() }, "Connection added");
    return connection;
  }
}
