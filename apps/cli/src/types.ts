export type ResponsivenessLabel = "High" | "Medium" | "Low" | "Unknown";

export type QualityTier = "good" | "caution" | "poor";

export interface NetworkQualityMetrics {
  downlinkMbps: number | null;
  uplinkMbps: number | null;
  idleLatencyMs: number | null;
  responsiveness: ResponsivenessLabel;
  responsivenessRpm: number | null;
  idleRpm: number | null;
}

export interface MetricTiers {
  downlink: QualityTier;
  uplink: QualityTier;
  idleLatency: QualityTier;
  responsiveness: QualityTier;
}

export interface PerformanceRecord extends NetworkQualityMetrics {
  timestamp: string;
  profile: string;
  ip: string;
}

export interface MeasurementCommand {
  command: string;
  args: string[];
}

export interface MeasurementResult {
  output: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  spawnError: string | null;
  timedOut: boolean;
}

export interface Reporter {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}
