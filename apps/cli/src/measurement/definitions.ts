import { MeasurementCommand } from "../types";
import { unsupportedPlatformMarker } from "./parsers";

const defaultExecutable = "networkQuality";

const unsupportedPlatform = (feature: string): MeasurementCommand => ({
  command: process.execPath,
  args: ["-e", `console.log(${JSON.stringify(`${unsupportedPlatformMarker} ${feature}`)});`]
});

/**
 * `networkQuality` ships with macOS 12 and later. Without an explicit
 * executable, other platforms get a command that only prints the
 * unsupported-platform marker, so a run still logs a row.
 */
export const buildMeasurementCommand = (
  executable: string | null,
  platform: NodeJS.Platform = process.platform
): MeasurementCommand => {
  if (executable !== null) {
    return { command: executable, args: ["-v"] };
  }

  if (platform !== "darwin") {
    return unsupportedPlatform(defaultExecutable);
  }

  return { command: defaultExecutable, args: ["-v"] };
};
