import { z } from "zod";

export const defaultCsvPath = "vpn_performance.csv";
export const defaultIpEndpoint = "https://api.ipify.org";

const envSchema = z.object({
  VPN_PERF_CSV_PATH: z.string().trim().min(1).default(defaultCsvPath),
  VPN_PERF_IP_ENDPOINT: z.string().trim().url("must be a URL").default(defaultIpEndpoint),
  VPN_PERF_IP_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(3000),
  VPN_PERF_MEASUREMENT_TIMEOUT_SECONDS: z.coerce.number().int().min(1).max(600).default(120),
  VPN_PERF_NETWORK_QUALITY_BIN: z.string().trim().min(1).optional()
});

export interface AppConfig {
  csvPath: string;
  ipEndpoint: string;
  ipTimeoutMs: number;
  measurementTimeoutSeconds: number;
  /** Explicit measurement binary; unset means the platform default. */
  networkQualityBin: string | null;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

// Empty variables count as unset so `VPN_PERF_CSV_PATH= vpn-perf` keeps the default.
const dropEmpty = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1] !== "")
  );

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(dropEmpty(env));

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  return {
    csvPath: parsed.data.VPN_PERF_CSV_PATH,
    ipEndpoint: parsed.data.VPN_PERF_IP_ENDPOINT,
    ipTimeoutMs: parsed.data.VPN_PERF_IP_TIMEOUT_MS,
    measurementTimeoutSeconds: parsed.data.VPN_PERF_MEASUREMENT_TIMEOUT_SECONDS,
    networkQualityBin: parsed.data.VPN_PERF_NETWORK_QUALITY_BIN ?? null
  };
};
