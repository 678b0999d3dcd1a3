import { isUnsupportedPlatformOutput, parseNetworkQuality } from "./measurement/parsers";
import { formatSummaryLine, formatTimestamp } from "./report/format";
import { appendRecord } from "./storage/csv-log";
import { MeasurementResult, PerformanceRecord, Reporter } from "./types";

export interface BenchmarkOptions {
  profile: string;
  csvPath: string;
  printRawOutput: boolean;
}

export interface BenchmarkDependencies {
  measure: () => Promise<MeasurementResult>;
  lookupIp: (onError: (message: string) => void) => Promise<string>;
  now: () => Date;
  reporter: Reporter;
}

const separator = "-------------------------------------------";

const reportMeasurementProblems = (result: MeasurementResult, reporter: Reporter): void => {
  if (isUnsupportedPlatformOutput(result.output)) {
    reporter.warn("networkQuality is only available on macOS 12 or later; metrics will be empty.");
    return;
  }

  if (result.timedOut) {
    reporter.warn("networkQuality timed out; parsing the partial output.");
  } else if (result.spawnError !== null) {
    reporter.warn(`networkQuality could not be started: ${result.spawnError}`);
  } else if (result.signal !== null) {
    reporter.warn(`networkQuality was terminated by ${result.signal}; parsing its output anyway.`);
  } else if (result.exitCode !== null && result.exitCode !== 0) {
    reporter.warn(`networkQuality exited with code ${result.exitCode}; parsing its output anyway.`);
  }
};

export const runBenchmark = async (
  options: BenchmarkOptions,
  { measure, lookupIp, now, reporter }: BenchmarkDependencies
): Promise<PerformanceRecord> => {
  reporter.info(`Running VPN performance test for profile: ${options.profile}`);
  reporter.info(separator);

  const measurement = await measure();
  reportMeasurementProblems(measurement, reporter);
  if (options.printRawOutput) {
    reporter.info(measurement.output);
  }

  const metrics = parseNetworkQuality(measurement.output);
  const ip = await lookupIp((message) => reporter.warn(message));

  const record: PerformanceRecord = {
    timestamp: formatTimestamp(now()),
    profile: options.profile,
    ip,
    ...metrics
  };

  appendRecord(options.csvPath, record);

  reporter.info(`✅ Logged results to ${options.csvPath}`);
  reporter.info(formatSummaryLine(record));

  return record;
};
