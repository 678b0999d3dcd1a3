import assert from "node:assert/strict";
import { test } from "node:test";

import {
  classifyDownlink,
  classifyIdleLatency,
  classifyMetrics,
  classifyResponsiveness,
  classifyUplink,
  tierMarker
} from "../../apps/cli/src/analysis/classify";

test("classifyDownlink: thresholds at 300 and 100 Mbps", () => {
  assert.equal(classifyDownlink(350), "good");
  assert.equal(classifyDownlink(300), "caution");
  assert.equal(classifyDownlink(150), "caution");
  assert.equal(classifyDownlink(100), "caution");
  assert.equal(classifyDownlink(50), "poor");
  assert.equal(classifyDownlink(null), "poor");
});

test("classifyUplink: thresholds at 20 and 5 Mbps", () => {
  assert.equal(classifyUplink(21), "good");
  assert.equal(classifyUplink(20), "caution");
  assert.equal(classifyUplink(5), "caution");
  assert.equal(classifyUplink(4.99), "poor");
  assert.equal(classifyUplink(null), "poor");
});

test("classifyIdleLatency: lower is better, 50 and 150 ms bounds", () => {
  assert.equal(classifyIdleLatency(49.9), "good");
  assert.equal(classifyIdleLatency(50), "caution");
  assert.equal(classifyIdleLatency(150), "caution");
  assert.equal(classifyIdleLatency(150.1), "poor");
  assert.equal(classifyIdleLatency(null), "poor");
});

test("classifyResponsiveness: Low and Unknown are both poor", () => {
  assert.equal(classifyResponsiveness("High"), "good");
  assert.equal(classifyResponsiveness("Medium"), "caution");
  assert.equal(classifyResponsiveness("Low"), "poor");
  assert.equal(classifyResponsiveness("Unknown"), "poor");
});

test("classifyMetrics: classifies every field", () => {
  const tiers = classifyMetrics({
    downlinkMbps: 369.737,
    uplinkMbps: 10,
    idleLatencyMs: null,
    responsiveness: "Medium",
    responsivenessRpm: 287,
    idleRpm: null
  });

  assert.deepEqual(tiers, {
    downlink: "good",
    uplink: "caution",
    idleLatency: "poor",
    responsiveness: "caution"
  });
});

test("tierMarker: one marker per tier", () => {
  assert.equal(tierMarker("good"), "🟢");
  assert.equal(tierMarker("caution"), "🟡");
  assert.equal(tierMarker("poor"), "🔴");
});
