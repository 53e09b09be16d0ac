// errors.ts
// Error types reported through command observers.

export type NetworkErrorCode =
  | "CONNECTOR_NOT_FOUND"
  | "CONNECTOR_DIRECTION"
  | "CONNECTOR_TYPE_MISMATCH"
  | "INPUT_ALREADY_CONNECTED"
  | "DUPLICATE_CONNECTOR"
  | "READER_NOT_FOUND"
  | "READER_FAILED"
  | "NETWORK_RUN_FAILED"
  | "FOREIGN_ALGORITHM"
  | "WORKER_CONTEXT"
  | "COMMAND_REUSED";

export class NetworkError extends Error {
  constructor(
    public readonly code: NetworkErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectorNotFoundError extends NetworkError {
  constructor(
    public readonly algorithmName: string,
    public readonly connectorName: string,
    public readonly direction: "input" | "output"
  ) {
    super(
      "CONNECTOR_NOT_FOUND",
      `connector not found: algorithm "${algorithmName}" has no ${direction} named "${connectorName}"`
    );
  }
}

export class ConnectorDirectionError extends NetworkError {
  constructor(message: string) {
    super("CONNECTOR_DIRECTION", message);
  }
}

export class ConnectorTypeMismatchError extends NetworkError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    context: string
  ) {
    super("CONNECTOR_TYPE_MISMATCH", `${context}: expected ${expected}, got ${actual}`);
  }
}

export class InputAlreadyConnectedError extends NetworkError {
  constructor(algorithmName: string, connectorName: string) {
    super(
      "INPUT_ALREADY_CONNECTED",
      `input "${connectorName}" of "${algorithmName}" is already fed by another output`
    );
  }
}

export class DuplicateConnectorError extends NetworkError {
  constructor(algorithmName: string, connectorName: string, direction: "input" | "output") {
    super(
      "DUPLICATE_CONNECTOR",
      `algorithm "${algorithmName}" already has an ${direction} named "${connectorName}"`
    );
  }
}

export class ReaderNotFoundError extends NetworkError {
  constructor(public readonly fileName: string) {
    super("READER_NOT_FOUND", `no reader can load "${fileName}"`);
  }
}

export class ReaderError extends NetworkError {
  constructor(
    public readonly fileName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("READER_FAILED", `failed to read "${fileName}": ${message}`, options);
  }
}

export class ForeignAlgorithmError extends NetworkError {
  constructor(algorithmName: string) {
    super(
      "FOREIGN_ALGORITHM",
      `algorithm "${algorithmName}" already belongs to another processing network`
    );
  }
}

export class WorkerContextError extends NetworkError {
  constructor(message: string) {
    super("WORKER_CONTEXT", message);
  }
}

export class CommandReuseError extends NetworkError {
  constructor(public readonly commandId: string, kind: string) {
    super("COMMAND_REUSED", `command ${commandId} (${kind}) was already committed`);
  }
}

export interface AlgorithmFailure {
  error: Error;
  algorithmId: string;
  algorithmName: string;
  timestamp: number;
}

export class NetworkRunError extends NetworkError {
  constructor(public readonly failures: readonly AlgorithmFailure[]) {
    super(
      "NETWORK_RUN_FAILED",
      `${failures.length} algorithm(s) failed: ${failures
        .map((f) => `${f.algorithmName}: ${f.error.message}`)
        .join("; ")}`
    );
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
