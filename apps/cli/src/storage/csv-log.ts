import { appendFileSync, existsSync } from "node:fs";
import { formatMeasurement, formatRpm } from "../report/format";
import { PerformanceRecord } from "../types";

export const csvHeader = [
  "Timestamp",
  "Profile",
  "IP",
  "Downlink (Mbps)",
  "Uplink (Mbps)",
  "Latency (ms)",
  "Responsiveness",
  "Responsiveness RPM",
  "Idle RPM"
] as const;

const rowTerminator = "\r\n";

export const escapeCsvField = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const toCsvRow = (fields: readonly string[]): string =>
  fields.map(escapeCsvField).join(",") + rowTerminator;

export const recordToFields = (record: PerformanceRecord): string[] => [
  record.timestamp,
  record.profile,
  record.ip,
  formatMeasurement(record.downlinkMbps),
  formatMeasurement(record.uplinkMbps),
  formatMeasurement(record.idleLatencyMs),
  record.responsiveness,
  formatRpm(record.responsivenessRpm),
  formatRpm(record.idleRpm)
];

/**
 * Appends one row, writing the header first when the file does not exist yet.
 * Write errors propagate to the caller.
 */
export const appendRecord = (path: string, record: PerformanceRecord): void => {
  const writeHeader = !existsSync(path);
  const content = (writeHeader ? toCsvRow(csvHeader) : "") + toCsvRow(recordToFields(record));

  appendFileSync(path, content, "utf8");
};
