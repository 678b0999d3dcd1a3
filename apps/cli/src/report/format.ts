import { classifyMetrics, tierMarker } from "../analysis/classify";
import { PerformanceRecord } from "../types";

const pad2 = (value: number): string => String(value).padStart(2, "0");

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

// Absent measurements print as 0.000 while absent RPMs stay blank; existing
// logs already carry this shape.
export const formatMeasurement = (value: number | null): string =>
  value === null ? "0.000" : value.toFixed(3);

export const formatRpm = (value: number | null): string => (value === null ? "" : String(value));

export const formatSummaryLine = (record: PerformanceRecord): string => {
  const tiers = classifyMetrics(record);

  return [
    `📊 Down: ${formatMeasurement(record.downlinkMbps)} Mbps ${tierMarker(tiers.downlink)}`,
    `Up: ${formatMeasurement(record.uplinkMbps)} Mbps ${tierMarker(tiers.uplink)}`,
    `Latency: ${formatMeasurement(record.idleLatencyMs)} ms ${tierMarker(tiers.idleLatency)}`,
    `Resp: ${record.responsiveness} ${tierMarker(tiers.responsiveness)}`
  ].join(" | ");
};
