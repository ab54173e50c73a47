import { dockerErrorMessage } from "./docker-errors.js";

export type BitcoindOperation = "ping" | "inspect" | "pull" | "create" | "start" | "stop" | "remove" | "logs";

/**
 * Base class for every failure surfaced by {@link Bitcoind}. The message
 * names the container and the operation; the daemon's error is kept on `cause`.
 */
export class BitcoindError extends Error {
  readonly containerName: string;
  readonly operation: BitcoindOperation;

  constructor(containerName: string, operation: BitcoindOperation, detail: string, cause?: unknown) {
    super(`bitcoind container ${containerName}: ${operation} failed: ${detail}`, { cause });
    this.name = "BitcoindError";
    this.containerName = containerName;
    this.operation = operation;
  }
}

export class DaemonUnavailableError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(
      containerName,
      "ping",
      `Docker daemon is not reachable, start it before running bitcoind (${dockerErrorMessage(cause)})`,
      cause,
    );
    this.name = "DaemonUnavailableError";
  }
}

export class InspectFailedError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(containerName, "inspect", dockerErrorMessage(cause), cause);
    this.name = "InspectFailedError";
  }
}

export class PullFailedError extends BitcoindError {
  readonly image: string;

  constructor(containerName: string, image: string, cause: unknown) {
    super(containerName, "pull", `could not pull ${image}: ${dockerErrorMessage(cause)}`, cause);
    this.name = "PullFailedError";
    this.image = image;
  }
}

export class CreateFailedError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(containerName, "create", dockerErrorMessage(cause), cause);
    this.name = "CreateFailedError";
  }
}

/** The container exists but did not enter the running state. It is left in place for inspection. */
export class StartFailedError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(containerName, "start", dockerErrorMessage(cause), cause);
    this.name = "StartFailedError";
  }
}

export class StopFailedError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(containerName, "stop", dockerErrorMessage(cause), cause);
    this.name = "StopFailedError";
  }
}

export class RemoveFailedError extends BitcoindError {
  constructor(containerName: string, cause: unknown) {
    super(containerName, "remove", dockerErrorMessage(cause), cause);
    this.name = "RemoveFailedError";
  }
}

export class ContainerNotFoundError extends BitcoindError {
  constructor(containerName: string, operation: BitcoindOperation) {
    super(containerName, operation, "no such container");
    this.name = "ContainerNotFoundError";
  }
}

export class ImageHashMismatchError extends BitcoindError {
  readonly expected: string;
  readonly found: string;

  constructor(containerName: string, expected: string, found: string) {
    super(containerName, "create", `image hash mismatch: expected ${expected}, found ${found}`);
    this.name = "ImageHashMismatchError";
    this.expected = expected;
    this.found = found;
  }
}
