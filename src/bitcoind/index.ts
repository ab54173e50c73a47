export { Bitcoind, type BitcoindOptions, type RegistryAuth } from "./bitcoind.js";
export * from "./errors.js";
export { createBitcoind, registryAuthFrom } from "./factory.js";
export {
  BITCOIN_DATA_DIR,
  BITCOIND_LABELS,
  buildContainerOptions,
  buildLaunchArgs,
  type ContainerSpec,
  DEFAULT_PORTS,
  formatBtc,
  rpcHostPort,
} from "./launch-args.js";
export * from "./types.js";
