import Docker from "dockerode";
import { config, type RegistryConfig } from "../config/index.js";
import { Bitcoind, type BitcoindOptions, type RegistryAuth } from "./bitcoind.js";
import type { BitcoindConfig } from "./types.js";

/** Registry credentials for dockerode, or undefined unless both username and password are set. */
export function registryAuthFrom(registry: RegistryConfig): RegistryAuth | undefined {
  if (!registry.username || !registry.password) return undefined;
  return { username: registry.username, password: registry.password, serveraddress: registry.server };
}

/**
 * Build a manager from a {@link BitcoindConfig}, filling anything not given in
 * `options` from the environment-driven process config.
 */
export function createBitcoind(bitcoindConfig: BitcoindConfig = config.bitcoind, options: BitcoindOptions = {}): Bitcoind {
  return Bitcoind.create(bitcoindConfig.containerName, bitcoindConfig.image, bitcoindConfig.rpc, {
    docker: options.docker ?? new Docker({ socketPath: config.docker.socketPath }),
    stopTimeoutSeconds: options.stopTimeoutSeconds ?? config.docker.stopTimeoutSeconds,
    dataVolume: options.dataVolume,
    expectedImageHash: options.expectedImageHash ?? bitcoindConfig.imageHash,
    registryAuth: options.registryAuth ?? registryAuthFrom(config.registry),
  });
}
