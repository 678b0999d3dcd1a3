import { NetworkQualityMetrics, ResponsivenessLabel } from "../types";

// networkQuality wording drifts between macOS releases, e.g.
//   Idle Latency: 35.624 ms
//   Idle Latency: 35.624 milliseconds | 1684 RPM
//   Responsiveness: Medium (208.467 milliseconds | 287 RPM)
//   Responsiveness: Low (48 RPM)
const downlinkPattern = /Downlink\s+capacity:\s*(?<value>[\d.]+)/i;
const uplinkPattern = /Uplink\s+capacity:\s*(?<value>[\d.]+)/i;
const idleLatencyPattern = /Idle\s+Latency:\s*(?<value>[\d.]+)\s*(?:ms|milliseconds)/i;
const idleRpmPattern = /Idle\s+Latency:.*?\|\s*(?<value>\d+)\s*RPM/i;
const responsivenessLabelPattern = /Responsiveness:\s*(?<value>High|Medium|Low)/i;
const responsivenessRpmPattern = /Responsiveness:.*?(?<value>\d+)\s*RPM/i;

export const unsupportedPlatformMarker = "UNSUPPORTED_PLATFORM:";

export const isUnsupportedPlatformOutput = (output: string): boolean =>
  output.includes(unsupportedPlatformMarker);

const captureValue = (output: string, pattern: RegExp): string | null =>
  output.match(pattern)?.groups?.value ?? null;

const captureFloat = (output: string, pattern: RegExp): number | null => {
  const raw = captureValue(output, pattern);
  if (raw === null) {
    return null;
  }

  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
};

const captureInteger = (output: string, pattern: RegExp): number | null => {
  const raw = captureValue(output, pattern);
  return raw === null ? null : Number.parseInt(raw, 10);
};

const toResponsivenessLabel = (raw: string | null): ResponsivenessLabel => {
  const normalized = raw?.toLowerCase();
  if (normalized === "high") {
    return "High";
  }
  if (normalized === "medium") {
    return "Medium";
  }
  if (normalized === "low") {
    return "Low";
  }
  return "Unknown";
};

export const parseNetworkQuality = (output: string): NetworkQualityMetrics => ({
  downlinkMbps: captureFloat(output, downlinkPattern),
  uplinkMbps: captureFloat(output, uplinkPattern),
  idleLatencyMs: captureFloat(output, idleLatencyPattern),
  responsiveness: toResponsivenessLabel(captureValue(output, responsivenessLabelPattern)),
  responsivenessRpm: captureInteger(output, responsivenessRpmPattern),
  idleRpm: captureInteger(output, idleRpmPattern)
});
