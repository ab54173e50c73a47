import { z } from "zod";
import { bitcoindConfigSchema } from "../bitcoind/types.js";

/** Credentials for pulling from a private registry. Both must be set to take effect. */
export const registryConfigSchema = z.object({
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  server: z.string().min(1).default("https://index.docker.io/v1/"),
});

export type RegistryConfig = z.infer<typeof registryConfigSchema>;

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  logFormat: z.enum(["json", "simple"]).default("json"),

  /** Docker daemon connection. */
  docker: z
    .object({
      socketPath: z.string().min(1).default("/var/run/docker.sock"),
      /** Seconds the daemon waits for bitcoind to shut down before killing it. */
      stopTimeoutSeconds: z.coerce.number().int().min(0).default(10),
    })
    .default({
      socketPath: "/var/run/docker.sock",
      stopTimeoutSeconds: 10,
    }),

  registry: registryConfigSchema.default({
    server: "https://index.docker.io/v1/",
  }),

  bitcoind: bitcoindConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;

/** Map environment variables onto {@link configSchema}. Unset variables fall back to schema defaults. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
    docker: {
      socketPath: env.DOCKER_SOCKET_PATH,
      stopTimeoutSeconds: env.BITCOIND_STOP_TIMEOUT,
    },
    registry: {
      username: env.REGISTRY_USERNAME,
      password: env.REGISTRY_PASSWORD,
      server: env.REGISTRY_SERVER,
    },
    bitcoind: {
      containerName: env.BITCOIND_CONTAINER_NAME,
      image: env.BITCOIND_IMAGE,
      imageHash: env.BITCOIND_IMAGE_HASH,
      rpc: {
        username: env.BITCOIN_RPC_USER,
        password: env.BITCOIN_RPC_PASSWORD,
        url: env.BITCOIN_RPC_URL,
        wallet: env.BITCOIN_RPC_WALLET,
        network: env.BITCOIN_NETWORK,
      },
    },
  });
}

export const config = parseConfig(process.env);
