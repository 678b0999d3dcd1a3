import { MetricTiers, NetworkQualityMetrics, QualityTier, ResponsivenessLabel } from "../types";

export const classifyDownlink = (mbps: number | null): QualityTier => {
  if (mbps === null) {
    return "poor";
  }
  if (mbps > 300) {
    return "good";
  }
  if (mbps >= 100) {
    return "caution";
  }
  return "poor";
};

export const classifyUplink = (mbps: number | null): QualityTier => {
  if (mbps === null) {
    return "poor";
  }
  if (mbps > 20) {
    return "good";
  }
  if (mbps >= 5) {
    return "caution";
  }
  return "poor";
};

export const classifyIdleLatency = (ms: number | null): QualityTier => {
  if (ms === null) {
    return "poor";
  }
  if (ms < 50) {
    return "good";
  }
  if (ms <= 150) {
    return "caution";
  }
  return "poor";
};

export const classifyResponsiveness = (label: ResponsivenessLabel): QualityTier => {
  if (label === "High") {
    return "good";
  }
  if (label === "Medium") {
    return "caution";
  }
  return "poor";
};

export const classifyMetrics = (metrics: NetworkQualityMetrics): MetricTiers => ({
  downlink: classifyDownlink(metrics.downlinkMbps),
  uplink: classifyUplink(metrics.uplinkMbps),
  idleLatency: classifyIdleLatency(metrics.idleLatencyMs),
  responsiveness: classifyResponsiveness(metrics.responsiveness)
});

const tierMarkers: Record<QualityTier, string> = {
  good: "🟢",
  caution: "🟡",
  poor: "🔴"
};

export const tierMarker = (tier: QualityTier): string => tierMarkers[tier];
