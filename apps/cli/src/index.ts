#!/usr/bin/env node
import { Command } from "commander";
import { runBenchmark } from "./benchmark";
import { loadConfig } from "./config";
import { buildMeasurementCommand } from "./measurement/definitions";
import { runMeasurement } from "./measurement/runner";
import { fetchExternalIp } from "./network/external-ip";
import { Reporter } from "./types";

interface CliOptions {
  csv?: string;
  raw?: boolean;
}

export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  reporter: Reporter;
  fetchImpl: typeof fetch;
  now: () => Date;
}

const consoleReporter: Reporter = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(`[vpn-perf] ${message}`),
  error: (message) => console.error(`[vpn-perf] ${message}`)
};

const defaultEnvironment = (): CliEnvironment => ({
  env: process.env,
  platform: process.platform,
  reporter: consoleReporter,
  fetchImpl: fetch,
  now: () => new Date()
});

export const createProgram = (environment: CliEnvironment = defaultEnvironment()): Command =>
  new Command()
    .name("vpn-perf")
    .description("Measure network quality with networkQuality and append the result to a CSV log.")
    .argument("[profile]", "label for the VPN profile under test", "Unknown")
    .option("--csv <path>", "CSV log to append to")
    .option("--raw", "print the raw networkQuality output")
    .action(async (profile: string, options: CliOptions) => {
      const config = loadConfig(environment.env);

      await runBenchmark(
        {
          profile,
          csvPath: options.csv ?? config.csvPath,
          printRawOutput: options.raw === true
        },
        {
          measure: () =>
            runMeasurement(
              buildMeasurementCommand(config.networkQualityBin, environment.platform),
              config.measurementTimeoutSeconds
            ),
          lookupIp: (onError) =>
            fetchExternalIp({
              endpoint: config.ipEndpoint,
              timeoutMs: config.ipTimeoutMs,
              fetchImpl: environment.fetchImpl,
              onError
            }),
          now: environment.now,
          reporter: environment.reporter
        }
      );
    });

/** Parses `argv` (node-style, with the executable and script first) and returns the exit code. */
export const runCli = async (
  argv: string[],
  environment: CliEnvironment = defaultEnvironment()
): Promise<number> => {
  try {
    await createProgram(environment).parseAsync(argv);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    environment.reporter.error(message);
    return 1;
  }
};

if (require.main === module) {
  void runCli(process.argv).then((exitCode) => {
    process.exitCode = exitCode;
  });
}
