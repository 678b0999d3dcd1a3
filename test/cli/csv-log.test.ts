import assert from "node:assert/strict";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { after, test } from "node:test";

import { appendRecord, escapeCsvField, recordToFields } from "../../apps/cli/src/storage/csv-log";
import { PerformanceRecord } from "../../apps/cli/src/types";

const workDir = mkdtempSync(path.join(tmpdir(), "vpn-perf-csv-"));

after(() => {
  rmSync(workDir, { recursive: true, force: true });
});

const headerRow =
  "Timestamp,Profile,IP,Downlink (Mbps),Uplink (Mbps),Latency (ms),Responsiveness,Responsiveness RPM,Idle RPM\r\n";

const measured: PerformanceRecord = {
  timestamp: "2024-05-06 12:30:00",
  profile: "Office",
  ip: "203.0.113.7",
  downlinkMbps: 369.737,
  uplinkMbps: 45.35,
  idleLatencyMs: 35.624,
  responsiveness: "Medium",
  responsivenessRpm: 287,
  idleRpm: 1684
};

test("escapeCsvField: quotes only when needed", () => {
  assert.equal(escapeCsvField("Office"), "Office");
  assert.equal(escapeCsvField('Home, "Travel"'), '"Home, ""Travel"""');
  assert.equal(escapeCsvField("two\nlines"), '"two\nlines"');
});

test("recordToFields: absent numbers as 0.000, absent RPMs blank", () => {
  assert.deepEqual(
    recordToFields({ ...measured, downlinkMbps: null, responsivenessRpm: null, idleRpm: null }),
    ["2024-05-06 12:30:00", "Office", "203.0.113.7", "0.000", "45.350", "35.624", "Medium", "", ""]
  );
});

test("appendRecord: header is written once across appends", () => {
  const file = path.join(workDir, "runs.csv");
  assert.equal(existsSync(file), false);

  appendRecord(file, measured);
  appendRecord(file, { ...measured, profile: "Home, \"Travel\"", idleRpm: null });

  assert.equal(
    readFileSync(file, "utf8"),
    headerRow +
      "2024-05-06 12:30:00,Office,203.0.113.7,369.737,45.350,35.624,Medium,287,1684\r\n" +
      '2024-05-06 12:30:00,"Home, ""Travel""",203.0.113.7,369.737,45.350,35.624,Medium,287,\r\n'
  );
});

test("appendRecord: write failures propagate", () => {
  const file = path.join(workDir, "missing-dir", "runs.csv");

  assert.throws(() => appendRecord(file, measured), /ENOENT/);
});
