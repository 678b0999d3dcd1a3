import { spawn } from "node:child_process";
import { TextDecoder } from "node:util";
import { MeasurementCommand, MeasurementResult } from "../types";

type Outcome = Pick<MeasurementResult, "exitCode" | "signal" | "spawnError">;

/**
 * Runs the measurement command and resolves with stdout and stderr interleaved
 * in arrival order. Never rejects: a non-zero exit, a signal, a spawn failure
 * or a timeout all resolve with whatever text was captured.
 */
export const runMeasurement = (
  executable: MeasurementCommand,
  timeoutSeconds: number
): Promise<MeasurementResult> =>
  new Promise((resolve) => {
    const child = spawn(executable.command, executable.args, {
      windowsHide: true
    });

    const stdoutDecoder = new TextDecoder("utf-8");
    const stderrDecoder = new TextDecoder("utf-8");

    let output = "";
    let finalized = false;
    let timedOut = false;
    let decoderFlushed = false;

    const flushDecoders = (): void => {
      if (decoderFlushed) {
        return;
      }

      decoderFlushed = true;
      output += stdoutDecoder.decode();
      output += stderrDecoder.decode();
    };

    const finalize = ({ exitCode, signal, spawnError }: Outcome): void => {
      if (finalized) {
        return;
      }

      finalized = true;
      clearTimeout(timeoutHandle);
      flushDecoders();
      resolve({ output, exitCode, signal, spawnError, timedOut });
    };

    // SIGKILL cannot be ignored, and the pipes are closed so a grandchild
    // holding them open does not keep the event loop alive.
    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
      finalize({ exitCode: null, signal: null, spawnError: null });
      child.stdout.destroy();
      child.stderr.destroy();
    }, timeoutSeconds * 1000);

    child.stdout.on("data", (chunk: Buffer) => {
      output += stdoutDecoder.decode(chunk, { stream: true });
    });

    child.stderr.on("data", (chunk: Buffer) => {
      output += stderrDecoder.decode(chunk, { stream: true });
    });

    child.on("error", (error) => {
      finalize({ exitCode: null, signal: null, spawnError: error.message });
    });

    child.on("close", (exitCode, signal) => {
      finalize({ exitCode, signal, spawnError: null });
    });
  });
