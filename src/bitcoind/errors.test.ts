import { describe, expect, it } from "vitest";
import { dockerError } from "../test/fake-docker.js";
import {
  BitcoindError,
  ContainerNotFoundError,
  DaemonUnavailableError,
  ImageHashMismatchError,
  PullFailedError,
  StartFailedError,
} from "./errors.js";

describe("BitcoindError", () => {
  it("names the container and the operation and keeps the cause", () => {
    const cause = dockerError(500, "OCI runtime create failed");
    const err = new StartFailedError("test-node", cause);

    expect(err).toBeInstanceOf(BitcoindError);
    expect(err.name).toBe("StartFailedError");
    expect(err.message).toBe("bitcoind container test-node: start failed: OCI runtime create failed");
    expect(err.containerName).toBe("test-node");
    expect(err.operation).toBe("start");
    expect(err.cause).toBe(cause);
  });

  it("explains an unreachable daemon", () => {
    const err = new DaemonUnavailableError("test-node", new Error("connect ENOENT /var/run/docker.sock"));

    expect(err.operation).toBe("ping");
    expect(err.message).toBe(
      "bitcoind container test-node: ping failed: Docker daemon is not reachable, start it before running bitcoind (connect ENOENT /var/run/docker.sock)",
    );
  });

  it("records the image a pull failed for", () => {
    const err = new PullFailedError("test-node", "bitcoin/bitcoin:29.1", dockerError(404, "manifest unknown"));

    expect(err.image).toBe("bitcoin/bitcoin:29.1");
    expect(err.message).toBe("bitcoind container test-node: pull failed: could not pull bitcoin/bitcoin:29.1: manifest unknown");
  });

  it("reports both hashes on a mismatch", () => {
    const err = new ImageHashMismatchError("test-node", "sha256:aaa", "sha256:bbb");

    expect(err.expected).toBe("sha256:aaa");
    expect(err.found).toBe("sha256:bbb");
    expect(err.message).toBe(
      "bitcoind container test-node: create failed: image hash mismatch: expected sha256:aaa, found sha256:bbb",
    );
  });

  it("has no cause when the container is simply missing", () => {
    const err = new ContainerNotFoundError("test-node", "logs");

    expect(err.message).toBe("bitcoind container test-node: logs failed: no such container");
    expect(err.cause).toBeUndefined();
  });
});
