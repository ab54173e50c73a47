import { z } from "zod";

export const BITCOIN_NETWORKS = ["mainnet", "testnet", "regtest", "signet"] as const;

export type BitcoinNetwork = (typeof BITCOIN_NETWORKS)[number];

/** Docker's own rule for container names. */
export const containerNameSchema = z
  .string()
  .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]+$/, "container name must match [a-zA-Z0-9][a-zA-Z0-9_.-]+");

/** Image reference, `repository[:tag]` or `repository@digest`. */
export const imageSchema = z
  .string()
  .trim()
  .min(1, "image reference is required")
  .refine((s) => !/\s/.test(s), "image reference must not contain whitespace");

/**
 * How an RPC client authenticates to the node. Handed to the client as-is;
 * the lifecycle manager only reads the credentials, the URL port and the network.
 */
export const rpcConfigSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  url: z.string().url(),
  wallet: z.string(),
  network: z.enum(BITCOIN_NETWORKS),
});

export type RpcConfig = Readonly<z.infer<typeof rpcConfigSchema>>;

const SATOSHIS_PER_BTC = 1e8;

/** A BTC amount bitcoind can parse exactly: no finer than one satoshi. */
const btcAmountSchema = z
  .number()
  .nonnegative()
  .finite()
  .refine(
    (v) => Math.abs(v * SATOSHIS_PER_BTC - Math.round(v * SATOSHIS_PER_BTC)) < 1e-6,
    "amount must have at most 8 decimal places",
  );

/** Bitcoin Core policy knobs, passed through to the node without upper bounds. */
export const bitcoindFlagsSchema = z.object({
  /** -minrelaytxfee, BTC/kvB. */
  minRelayTxFee: btcAmountSchema,
  /** -blockmintxfee, BTC/kvB. */
  blockMinTxFee: btcAmountSchema,
  /** -debug level; 0 disables debug logging. */
  debug: z.number().int().nonnegative(),
  /** -fallbackfee, BTC/kvB. */
  fallbackFee: btcAmountSchema,
});

export type BitcoindFlags = Readonly<z.infer<typeof bitcoindFlagsSchema>>;

export const DEFAULT_BITCOIND_FLAGS: BitcoindFlags = Object.freeze({
  minRelayTxFee: 0.00001,
  blockMinTxFee: 0.00001,
  debug: 1,
  fallbackFee: 0.0002,
});

export function defaultBitcoindFlags(): BitcoindFlags {
  return DEFAULT_BITCOIND_FLAGS;
}

export function createBitcoindFlags(values: z.input<typeof bitcoindFlagsSchema>): BitcoindFlags {
  return Object.freeze(bitcoindFlagsSchema.parse(values));
}

export function createRpcConfig(values: z.input<typeof rpcConfigSchema>): RpcConfig {
  return Object.freeze(rpcConfigSchema.parse(values));
}

export function bitcoindFlagsEqual(a: BitcoindFlags, b: BitcoindFlags): boolean {
  return (
    a.minRelayTxFee === b.minRelayTxFee &&
    a.blockMinTxFee === b.blockMinTxFee &&
    a.debug === b.debug &&
    a.fallbackFee === b.fallbackFee
  );
}

/** Everything needed to build a manager from environment-driven configuration. */
export const bitcoindConfigSchema = z.object({
  containerName: containerNameSchema.default("bitcoin-regtest"),
  image: imageSchema.default("bitcoin/bitcoin:29.1"),
  /** Image ID the container must run; unchecked when absent. */
  imageHash: z.string().min(1).optional(),
  rpc: z
    .object({
      username: z.string().min(1).default("foo"),
      password: z.string().min(1).default("rpcpassword"),
      url: z.string().url().default("http://localhost:18443"),
      wallet: z.string().default("mywallet"),
      network: z.enum(BITCOIN_NETWORKS).default("regtest"),
    })
    .default({
      username: "foo",
      password: "rpcpassword",
      url: "http://localhost:18443",
      wallet: "mywallet",
      network: "regtest",
    }),
});

export type BitcoindConfig = z.infer<typeof bitcoindConfigSchema>;

/**
 * Lifecycle state as last observed by the manager.
 *
 * ```
 * not-created → running          (start: create + run)
 * created     → running          (start)
 * running     → stopped          (stop)
 * stopped     → running          (start)
 * any         → not-created      (remove)
 * ```
 */
export type BitcoindState = "not-created" | "created" | "running" | "stopped";

export interface BitcoindStatus {
  containerName: string;
  /** Docker container ID (null if no container exists). */
  containerId: string | null;
  /** Image the container was created from, or the configured image when there is no container. */
  image: string;
  state: BitcoindState;
  running: boolean;
}
