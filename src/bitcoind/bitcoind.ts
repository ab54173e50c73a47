import Docker from "dockerode";
import { logger } from "../config/logger.js";
import { dockerErrorMessage, isImageNotFound, isNotFound, isNotModified } from "./docker-errors.js";
import {
  BitcoindError,
  ContainerNotFoundError,
  CreateFailedError,
  DaemonUnavailableError,
  ImageHashMismatchError,
  InspectFailedError,
  PullFailedError,
  RemoveFailedError,
  StartFailedError,
  StopFailedError,
} from "./errors.js";
import { buildContainerOptions } from "./launch-args.js";
import {
  type BitcoindFlags,
  type BitcoindState,
  type BitcoindStatus,
  containerNameSchema,
  createBitcoindFlags,
  createRpcConfig,
  defaultBitcoindFlags,
  imageSchema,
  type RpcConfig,
} from "./types.js";

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

export interface BitcoindOptions {
  /** Docker client. Defaults to dockerode's local defaults (DOCKER_HOST or the local socket). */
  docker?: Docker;
  /** Seconds the daemon waits for bitcoind to exit before killing it. */
  stopTimeoutSeconds?: number;
  /** Named volume or absolute host path mounted as the node's data directory. */
  dataVolume?: string;
  /** Image ID the created container must run, with or without the `sha256:` prefix. */
  expectedImageHash?: string;
  /** Credentials for pulling from a private registry. */
  registryAuth?: RegistryAuth;
}

interface PullProgressEvent {
  id?: string;
  status?: string;
  progress?: string;
  error?: string;
  errorDetail?: { message?: string };
}

const DEFAULT_STOP_TIMEOUT_SECONDS = 10;

function stateOf(info: Docker.ContainerInspectInfo): BitcoindState {
  if (info.State.Running) return "running";
  return info.State.Status === "created" ? "created" : "stopped";
}

/** The daemon reports pull failures as stream events, not as a failed request. */
function pullEventError(events: PullProgressEvent[]): Error | null {
  for (const event of events) {
    const message = event.errorDetail?.message ?? event.error;
    if (message) return new Error(message);
  }
  return null;
}

function normalizeImageId(id: string): string {
  return id.startsWith("sha256:") ? id.slice("sha256:".length) : id;
}

/**
 * Owns one named Docker container running Bitcoin Core.
 *
 * Construction never talks to the daemon. `start()` pings the daemon, then
 * reuses a container with the configured name if one exists (running or not)
 * or creates one, pulling the image once if the daemon does not have it.
 * `stop()` stops without removing so logs stay readable; `remove()` cleans up.
 *
 * Any container with the configured name is treated as ours, whatever image
 * or flags created it. Callers running in parallel must pick distinct names.
 */
export class Bitcoind {
  readonly containerName: string;
  readonly image: string;
  private readonly docker: Docker;
  private readonly rpc: RpcConfig;
  private readonly bitcoindFlags: BitcoindFlags;
  private readonly stopTimeoutSeconds: number;
  private readonly dataVolume: string | undefined;
  private readonly expectedImageHash: string | undefined;
  private readonly registryAuth: RegistryAuth | undefined;
  private currentState: BitcoindState = "not-created";
  private currentContainerId: string | null = null;

  constructor(
    containerName: string,
    image: string,
    rpcConfig: RpcConfig,
    flags: BitcoindFlags = defaultBitcoindFlags(),
    options: BitcoindOptions = {},
  ) {
    this.containerName = containerNameSchema.parse(containerName);
    this.image = imageSchema.parse(image);
    this.rpc = createRpcConfig(rpcConfig);
    this.bitcoindFlags = createBitcoindFlags(flags);
    this.docker = options.docker ?? new Docker();
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? DEFAULT_STOP_TIMEOUT_SECONDS;
    this.dataVolume = options.dataVolume;
    this.expectedImageHash = options.expectedImageHash;
    this.registryAuth = options.registryAuth;
  }

  /** Manager with the default policy flags. */
  static create(containerName: string, image: string, rpcConfig: RpcConfig, options: BitcoindOptions = {}): Bitcoind {
    return new Bitcoind(containerName, image, rpcConfig, defaultBitcoindFlags(), options);
  }

  static createWithFlags(
    containerName: string,
    image: string,
    rpcConfig: RpcConfig,
    flags: BitcoindFlags,
    options: BitcoindOptions = {},
  ): Bitcoind {
    return new Bitcoind(containerName, image, rpcConfig, flags, options);
  }

  get state(): BitcoindState {
    return this.currentState;
  }

  get containerId(): string | null {
    return this.currentContainerId;
  }

  /** The RPC settings the node was launched with, for handing to an RPC client. */
  get rpcConfig(): RpcConfig {
    return this.rpc;
  }

  get flags(): BitcoindFlags {
    return this.bitcoindFlags;
  }

  /**
   * Bring the node to the running state. Idempotent: a running container is
   * left alone and a stopped one is started again rather than recreated.
   */
  async start(): Promise<void> {
    logger.info(`Checking Docker daemon before starting ${this.containerName}`);
    try {
      await this.docker.ping();
    } catch (err) {
      throw new DaemonUnavailableError(this.containerName, err);
    }

    let existing: Docker.ContainerInspectInfo | null;
    try {
      existing = await this.findContainer();
    } catch (err) {
      throw new InspectFailedError(this.containerName, err);
    }

    if (existing) {
      this.currentContainerId = existing.Id;
      this.currentState = stateOf(existing);
      this.warnOnImageMismatch(existing);

      if (existing.State.Paused) {
        await this.unpauseContainer(this.docker.getContainer(existing.Id));
        logger.info(`Unpaused container ${this.containerName}`, { containerId: existing.Id });
        return;
      }

      if (existing.State.Running) {
        logger.info(`Container ${this.containerName} already running`, { containerId: existing.Id });
        return;
      }

      await this.startContainer(this.docker.getContainer(existing.Id));
      logger.info(`Started existing container ${this.containerName}`, { containerId: existing.Id });
      return;
    }

    const container = await this.createContainer();
    this.currentContainerId = container.id;
    this.currentState = "created";
    logger.info(`Created container ${this.containerName}`, { containerId: container.id, image: this.image });

    if (this.expectedImageHash) {
      await this.verifyImageHash(container, this.expectedImageHash);
    }

    await this.startContainer(container);
    logger.info(`Started bitcoind container ${this.containerName}`, {
      containerId: container.id,
      network: this.rpc.network,
    });
  }

  /**
   * Stop the container with the daemon's graceful timeout. A missing or
   * already-stopped container is a no-op. The container is not removed.
   */
  async stop(): Promise<void> {
    logger.info(`Stopping bitcoind container ${this.containerName}`);

    let existing: Docker.ContainerInspectInfo | null;
    try {
      existing = await this.findContainer();
    } catch (err) {
      throw new StopFailedError(this.containerName, err);
    }

    if (!existing) {
      this.forgetContainer();
      logger.info(`Container ${this.containerName} not found, nothing to stop`);
      return;
    }

    this.currentContainerId = existing.Id;
    if (!existing.State.Running) {
      this.currentState = stateOf(existing);
      return;
    }

    try {
      await this.docker.getContainer(existing.Id).stop({ t: this.stopTimeoutSeconds });
    } catch (err) {
      if (isNotFound(err)) {
        this.forgetContainer();
        return;
      }
      if (!isNotModified(err)) throw new StopFailedError(this.containerName, err);
    }
    this.currentState = "stopped";
    logger.info(`Stopped bitcoind container ${this.containerName}`, { containerId: existing.Id });
  }

  /**
   * Force-remove the container, running or not. A missing container is a no-op.
   */
  async remove(removeVolumes = false): Promise<void> {
    let existing: Docker.ContainerInspectInfo | null;
    try {
      existing = await this.findContainer();
    } catch (err) {
      throw new RemoveFailedError(this.containerName, err);
    }

    if (existing) {
      try {
        await this.docker.getContainer(existing.Id).remove({ force: true, v: removeVolumes });
      } catch (err) {
        if (!isNotFound(err)) throw new RemoveFailedError(this.containerName, err);
      }
      logger.info(`Removed bitcoind container ${this.containerName}`, { containerId: existing.Id });
    }
    this.forgetContainer();
  }

  /** Live status from the daemon. Also refreshes {@link state}. */
  async status(): Promise<BitcoindStatus> {
    let existing: Docker.ContainerInspectInfo | null;
    try {
      existing = await this.findContainer();
    } catch (err) {
      throw new InspectFailedError(this.containerName, err);
    }

    if (!existing) {
      this.forgetContainer();
      return {
        containerName: this.containerName,
        containerId: null,
        image: this.image,
        state: "not-created",
        running: false,
      };
    }

    this.currentContainerId = existing.Id;
    this.currentState = stateOf(existing);
    return {
      containerName: this.containerName,
      containerId: existing.Id,
      image: existing.Config.Image,
      state: this.currentState,
      running: existing.State.Running,
    };
  }

  /** Container stdout/stderr, for post-mortem inspection after a failed start. */
  async logs(tail = 100): Promise<string> {
    let existing: Docker.ContainerInspectInfo | null;
    try {
      existing = await this.findContainer();
    } catch (err) {
      throw new InspectFailedError(this.containerName, err);
    }
    if (!existing) throw new ContainerNotFoundError(this.containerName, "logs");

    try {
      const buffer = await this.docker.getContainer(existing.Id).logs({
        stdout: true,
        stderr: true,
        tail,
        follow: false,
      });
      return buffer.toString("utf-8");
    } catch (err) {
      throw new BitcoindError(this.containerName, "logs", dockerErrorMessage(err), err);
    }
  }

  // --- Private helpers ---

  /**
   * Inspect by name. Null when the daemon has no container of exactly that
   * name; the daemon also resolves ID prefixes, which must not match.
   */
  private async findContainer(): Promise<Docker.ContainerInspectInfo | null> {
    let info: Docker.ContainerInspectInfo;
    try {
      info = await this.docker.getContainer(this.containerName).inspect();
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    return info.Name === `/${this.containerName}` ? info : null;
  }

  /**
   * Create the container. If the daemon lacks the image, pull it and try
   * exactly once more. An image still missing after the pull is a pull failure.
   */
  private async createContainer(): Promise<Docker.Container> {
    const options = buildContainerOptions({
      containerName: this.containerName,
      image: this.image,
      rpc: this.rpc,
      flags: this.bitcoindFlags,
      dataVolume: this.dataVolume,
    });

    try {
      return await this.docker.createContainer(options);
    } catch (err) {
      if (!isImageNotFound(err)) throw new CreateFailedError(this.containerName, err);
      logger.info(`Image ${this.image} not found locally, pulling`);
    }

    await this.pullImage();

    try {
      return await this.docker.createContainer(options);
    } catch (err) {
      if (isImageNotFound(err)) throw new PullFailedError(this.containerName, this.image, err);
      throw new CreateFailedError(this.containerName, err);
    }
  }

  private async pullImage(): Promise<void> {
    logger.info(`Pulling image ${this.image}`);
    try {
      const stream = await this.docker.pull(this.image, this.registryAuth ? { authconfig: this.registryAuth } : {});
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: Error | null, output: PullProgressEvent[]) => {
            const failure = err ?? pullEventError(output);
            if (failure) reject(failure);
            else resolve();
          },
          (event: PullProgressEvent) => {
            if (event.status) {
              logger.debug(`Pull ${this.image}: ${event.status}`, { layer: event.id, progress: event.progress });
            }
          },
        );
      });
    } catch (err) {
      throw new PullFailedError(this.containerName, this.image, err);
    }
    logger.info(`Pulled image ${this.image}`);
  }

  private async startContainer(container: Docker.Container): Promise<void> {
    try {
      await container.start();
    } catch (err) {
      // 304: already started between inspect and start
      if (!isNotModified(err)) throw new StartFailedError(this.containerName, err);
    }
    this.currentState = "running";
  }

  private async unpauseContainer(container: Docker.Container): Promise<void> {
    try {
      await container.unpause();
    } catch (err) {
      throw new StartFailedError(this.containerName, err);
    }
    this.currentState = "running";
  }

  /** Remove the freshly created container and fail when it runs a different image than pinned. */
  private async verifyImageHash(container: Docker.Container, expected: string): Promise<void> {
    let info: Docker.ContainerInspectInfo;
    try {
      info = await container.inspect();
    } catch (err) {
      throw new InspectFailedError(this.containerName, err);
    }

    if (normalizeImageId(info.Image) === normalizeImageId(expected)) return;

    logger.error(`Container ${this.containerName} runs unexpected image, removing it`, {
      expected,
      found: info.Image,
    });
    try {
      await container.remove({ force: true });
    } catch (err) {
      throw new RemoveFailedError(this.containerName, err);
    }
    this.forgetContainer();
    throw new ImageHashMismatchError(this.containerName, expected, info.Image);
  }

  private warnOnImageMismatch(info: Docker.ContainerInspectInfo): void {
    if (info.Config.Image !== this.image) {
      logger.warn(`Reusing container ${this.containerName} created from a different image`, {
        containerImage: info.Config.Image,
        configuredImage: this.image,
      });
    }
  }

  private forgetContainer(): void {
    this.currentState = "not-created";
    this.currentContainerId = null;
  }
}
