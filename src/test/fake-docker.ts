import { PassThrough } from "node:stream";
import Modem from "docker-modem";
import type Docker from "dockerode";

/** An error shaped like the ones dockerode raises for non-2xx daemon replies. */
export function dockerError(statusCode: number, message: string): Error {
  return Object.assign(new Error(`(HTTP code ${statusCode}) ${message}`), {
    statusCode,
    json: { message },
  });
}

export interface FakeContainer {
  id: string;
  name: string;
  image: string;
  imageId: string;
  options: Docker.ContainerCreateOptions;
  status: "created" | "running" | "paused" | "exited";
}

/**
 * In-process stand-in for the subset of dockerode the lifecycle manager
 * uses. Keeps containers and images in memory and counts calls.
 */
export class FakeDocker {
  daemonUp = true;
  /** Images present locally, reference → image ID. */
  readonly images = new Map<string, string>();
  /** Images the registry can serve, reference → image ID. */
  readonly registry = new Map<string, string>();
  readonly containers = new Map<string, FakeContainer>();
  readonly calls = { ping: 0, inspect: 0, create: 0, pull: 0, start: 0, unpause: 0, stop: 0, remove: 0 };
  /** When set, container start fails with this error. */
  startError: Error | null = null;
  /** When set, the pull stream ends with an error event carrying this message. */
  pullStreamError: string | null = null;
  /** Timeouts passed to stop. */
  readonly stopTimeouts: Array<number | undefined> = [];
  private nextId = 1;

  /** The real modem, so pull streams are parsed the way dockerode parses them. */
  readonly modem = new Modem();

  async ping(): Promise<string> {
    this.calls.ping++;
    this.assertUp();
    return "OK";
  }

  /** Newline-delimited JSON progress, as the daemon streams it. */
  async pull(image: string): Promise<PassThrough> {
    this.calls.pull++;
    this.assertUp();
    const imageId = this.registry.get(image);
    if (!imageId) throw dockerError(404, `manifest for ${image} not found: manifest unknown`);

    const stream = new PassThrough();
    stream.write(`${JSON.stringify({ status: `Pulling from ${image}` })}\n`);
    if (this.pullStreamError) {
      const message = this.pullStreamError;
      stream.write(`${JSON.stringify({ error: message, errorDetail: { message } })}\n`);
    } else {
      stream.write(`${JSON.stringify({ id: "layer-1", status: "Downloading", progress: "[=>   ]" })}\n`);
      stream.write(`${JSON.stringify({ status: "Download complete" })}\n`);
      this.images.set(image, imageId);
    }
    stream.end();
    return stream;
  }

  async createContainer(options: Docker.ContainerCreateOptions) {
    this.calls.create++;
    this.assertUp();
    const image = options.Image ?? "";
    const imageId = this.images.get(image);
    if (!imageId) throw dockerError(404, `No such image: ${image}`);
    const name = options.name ?? `container-${this.nextId}`;
    if (this.byName(name)) throw dockerError(409, `Conflict. The container name "/${name}" is already in use`);

    const record: FakeContainer = {
      id: `cid-${this.nextId++}`,
      name,
      image,
      imageId,
      options,
      status: "created",
    };
    this.containers.set(record.id, record);
    return this.getContainer(record.id);
  }

  getContainer(idOrName: string) {
    const resolve = (): FakeContainer => {
      this.assertUp();
      const record = this.lookup(idOrName);
      if (!record) throw dockerError(404, `No such container: ${idOrName}`);
      return record;
    };

    return {
      id: this.lookup(idOrName)?.id ?? idOrName,
      inspect: async () => {
        this.calls.inspect++;
        const record = resolve();
        return {
          Id: record.id,
          Name: `/${record.name}`,
          Image: `sha256:${record.imageId}`,
          Config: { Image: record.image, Cmd: record.options.Cmd },
          State: {
            Status: record.status,
            Running: record.status === "running" || record.status === "paused",
            Paused: record.status === "paused",
          },
        };
      },
      start: async () => {
        this.calls.start++;
        const record = resolve();
        if (record.status === "running" || record.status === "paused") {
          throw dockerError(304, "container already started");
        }
        if (this.startError) throw this.startError;
        record.status = "running";
      },
      unpause: async () => {
        this.calls.unpause++;
        const record = resolve();
        if (record.status !== "paused") throw dockerError(409, `Container ${record.id} is not paused`);
        record.status = "running";
      },
      stop: async (opts: { t?: number } = {}) => {
        this.calls.stop++;
        const record = resolve();
        this.stopTimeouts.push(opts.t);
        if (record.status !== "running" && record.status !== "paused") {
          throw dockerError(304, "container already stopped");
        }
        record.status = "exited";
      },
      remove: async (opts: { force?: boolean } = {}) => {
        this.calls.remove++;
        const record = resolve();
        if (record.status !== "created" && record.status !== "exited" && !opts.force) {
          throw dockerError(409, "You cannot remove a running container. Stop the container before attempting removal");
        }
        this.containers.delete(record.id);
      },
      logs: async () => {
        const record = resolve();
        return Buffer.from(`bitcoind ${record.name} log\n`);
      },
    };
  }

  /** Snapshot of a container by name, for assertions. */
  container(name: string): FakeContainer | undefined {
    return this.byName(name);
  }

  private byName(name: string): FakeContainer | undefined {
    return [...this.containers.values()].find((c) => c.name === name);
  }

  /** The daemon's resolution order: full ID, then name, then unique ID prefix. */
  private lookup(idOrName: string): FakeContainer | undefined {
    const byId = this.containers.get(idOrName);
    if (byId) return byId;
    const named = this.byName(idOrName);
    if (named) return named;
    const prefixed = [...this.containers.values()].filter((c) => c.id.startsWith(idOrName));
    return prefixed.length === 1 ? prefixed[0] : undefined;
  }

  private assertUp(): void {
    if (!this.daemonUp) {
      throw Object.assign(new Error("connect ENOENT /var/run/docker.sock"), { code: "ENOENT" });
    }
  }
}
