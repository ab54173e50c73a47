import type Docker from "dockerode";
import type { BitcoinNetwork, BitcoindFlags, RpcConfig } from "./types.js";

/** Default RPC and P2P ports Bitcoin Core listens on for each chain. */
export const DEFAULT_PORTS: Record<BitcoinNetwork, { rpc: number; p2p: number }> = {
  mainnet: { rpc: 8332, p2p: 8333 },
  testnet: { rpc: 18332, p2p: 18333 },
  regtest: { rpc: 18443, p2p: 18444 },
  signet: { rpc: 38332, p2p: 38333 },
};

const CHAIN_FLAGS: Record<BitcoinNetwork, string | null> = {
  mainnet: null,
  testnet: "-testnet",
  regtest: "-regtest",
  signet: "-signet",
};

/** Data directory inside the container. */
export const BITCOIN_DATA_DIR = "/data";

/** Docker label namespace for containers created by this package. */
export const BITCOIND_LABELS = {
  managed: "bitcoind-fixture.managed",
  image: "bitcoind-fixture.image",
} as const;

/**
 * Render a BTC amount the way bitcoind parses it: plain decimal, never
 * exponent notation (`1e-7` is rejected by the node). Fractions are rounded
 * to 8 places; validated flags never carry finer amounts.
 */
export function formatBtc(value: number): string {
  if (Number.isInteger(value)) return BigInt(value).toString();
  return value.toFixed(8).replace(/0+$/, "").replace(/\.$/, "");
}

/** bitcoind command-line arguments for the given RPC config and policy flags. */
export function buildLaunchArgs(rpc: RpcConfig, flags: BitcoindFlags): string[] {
  const args: string[] = [];
  const chainFlag = CHAIN_FLAGS[rpc.network];
  if (chainFlag) args.push(chainFlag);

  args.push(
    "-server",
    "-printtoconsole",
    "-txindex=1",
    "-rpcbind=0.0.0.0",
    "-rpcallowip=0.0.0.0/0",
    `-rpcuser=${rpc.username}`,
    `-rpcpassword=${rpc.password}`,
    `-debug=${flags.debug}`,
    `-minrelaytxfee=${formatBtc(flags.minRelayTxFee)}`,
    `-blockmintxfee=${formatBtc(flags.blockMinTxFee)}`,
    `-fallbackfee=${formatBtc(flags.fallbackFee)}`,
  );
  return args;
}

/** Host port the RPC interface is published on: the URL's port, or the chain default. */
export function rpcHostPort(rpc: RpcConfig): number {
  const port = new URL(rpc.url).port;
  return port ? Number.parseInt(port, 10) : DEFAULT_PORTS[rpc.network].rpc;
}

export interface ContainerSpec {
  containerName: string;
  image: string;
  rpc: RpcConfig;
  flags: BitcoindFlags;
  /** Named volume or absolute host path mounted at {@link BITCOIN_DATA_DIR}. */
  dataVolume?: string;
}

export function buildContainerOptions(spec: ContainerSpec): Docker.ContainerCreateOptions {
  const ports = DEFAULT_PORTS[spec.rpc.network];
  const rpcPort = `${ports.rpc}/tcp`;
  const p2pPort = `${ports.p2p}/tcp`;

  return {
    name: spec.containerName,
    Image: spec.image,
    Cmd: buildLaunchArgs(spec.rpc, spec.flags),
    Env: [`BITCOIN_DATA=${BITCOIN_DATA_DIR}`],
    Labels: {
      [BITCOIND_LABELS.managed]: "true",
      [BITCOIND_LABELS.image]: spec.image,
    },
    ExposedPorts: {
      [rpcPort]: {},
      [p2pPort]: {},
    },
    HostConfig: {
      // Kept after stop so logs can be read post-mortem; remove() deletes it.
      AutoRemove: false,
      PortBindings: {
        [rpcPort]: [{ HostIp: "0.0.0.0", HostPort: String(rpcHostPort(spec.rpc)) }],
        [p2pPort]: [{ HostIp: "0.0.0.0", HostPort: String(ports.p2p) }],
      },
      Binds: spec.dataVolume ? [`${spec.dataVolume}:${BITCOIN_DATA_DIR}`] : undefined,
    },
  };
}
