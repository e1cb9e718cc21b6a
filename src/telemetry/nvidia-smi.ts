import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { TelemetryUnavailable, isTelemetryUnavailable, safeErrorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { GpuSnapshot } from "../types.js";
import type { ProbeStep, TelemetryProvider } from "./provider.js";
import {
  GPU_QUERY_FIELDS,
  PROCESS_QUERY_FIELDS,
  parseGpuQuery,
  parseProcessQuery,
} from "./query.js";

const execFileAsync = promisify(execFile);

/**
 * Captured output of a finished command.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs an executable and resolves with its output. Rejects like `execFile` does:
 * `code` is the errno string or the exit status, `killed` is set on timeout.
 */
export type CommandRunner = (file: string, args: readonly string[], options: RunOptions) => Promise<CommandResult>;

/**
 * Default runner backed by `execFile`; the child is killed once the timeout elapses
 * or the signal aborts.
 */
export const runCommand: CommandRunner = async (file, args, { timeoutMs, signal }) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: "utf8",
    timeout: timeoutMs,
    signal,
    killSignal: "SIGKILL",
    maxBuffer: 4 * 1024 * 1024,
    windowsHide: true,
  });
  return { stdout, stderr };
};

export interface NvidiaSmiOptions {
  executable: string;
  timeoutMs: number;
  processes: boolean;
  logger: Logger;
  run?: CommandRunner;
}

const firstLine = (text: unknown): string =>
  typeof text === "string" ? (text.trim().split(/\r?\n/)[0] ?? "") : "";

/**
 * Map a runner rejection onto a TelemetryUnavailable.
 * @param error - Rejection value.
 * @param executable - Executable that was invoked.
 * @param timeoutMs - Timeout that applied.
 * @returns Classified failure.
 */
export const classifyFailure = (error: unknown, executable: string, timeoutMs: number): TelemetryUnavailable => {
  if (isTelemetryUnavailable(error)) {
    return error;
  }
  if (typeof error !== "object" || error === null) {
    return new TelemetryUnavailable("exit", safeErrorMessage(error));
  }
  if ("name" in error && error.name === "AbortError") {
    return new TelemetryUnavailable("aborted", `${executable} was cancelled`);
  }
  const code = "code" in error ? error.code : undefined;
  if (code === "ENOENT" || code === "EACCES") {
    return new TelemetryUnavailable("missing", `${executable} not found or not executable`);
  }
  if (("killed" in error && error.killed === true) || code === "ETIMEDOUT") {
    return new TelemetryUnavailable("timeout", `${executable} did not answer within ${timeoutMs} ms`);
  }
  if (typeof code === "number") {
    const stderr = "stderr" in error ? firstLine(error.stderr) : "";
    const stdout = "stdout" in error ? firstLine(error.stdout) : "";
    const message = stderr || stdout;
    return new TelemetryUnavailable("exit", `${executable} exited with code ${code}${message ? `: ${message}` : ""}`);
  }
  return new TelemetryUnavailable("exit", safeErrorMessage(error));
};

/**
 * Telemetry provider shelling out to nvidia-smi.
 */
export class NvidiaSmiProvider implements TelemetryProvider {
  public readonly name = "nvidia-smi";
  private readonly options: NvidiaSmiOptions;
  private readonly run: CommandRunner;

  public constructor(options: NvidiaSmiOptions) {
    this.options = options;
    this.run = options.run ?? runCommand;
  }

  /**
   * Query every GPU, then attach running compute processes.
   * @returns Snapshots in nvidia-smi order.
   */
  public async poll(signal?: AbortSignal): Promise<GpuSnapshot[]> {
    const output = await this.invoke(
      [`--query-gpu=${GPU_QUERY_FIELDS.join(",")}`, "--format=csv,noheader,nounits"],
      signal,
    );
    const { snapshots, fieldErrors } = parseGpuQuery(output, GPU_QUERY_FIELDS);
    for (const fieldError of fieldErrors) {
      this.options.logger.debug("Unparseable telemetry field", {
        field: fieldError.field,
        gpu: fieldError.gpuIndex,
        raw: fieldError.raw,
      });
    }

    if (this.options.processes) {
      await this.attachProcesses(snapshots, signal);
    }
    return snapshots;
  }

  /**
   * Step-by-step diagnostics for the `check` command.
   * @returns One entry per step, stopping after the first failure.
   */
  public async probe(): Promise<ProbeStep[]> {
    const steps: ProbeStep[] = [];
    const { executable } = this.options;

    try {
      const listing = await this.invoke(["-L"]);
      const devices = listing.split(/\r?\n/).filter((line) => line.trim().length > 0);
      steps.push({ label: `Run ${executable}`, ok: true, detail: devices.join("\n") || "no devices listed" });
    } catch (error) {
      steps.push({ label: `Run ${executable}`, ok: false, detail: safeErrorMessage(error) });
      return steps;
    }

    try {
      const snapshots = await this.poll();
      const driver = snapshots[0]?.driver_version ?? "unknown";
      steps.push({
        label: "Query telemetry",
        ok: true,
        detail: `${snapshots.length} GPU(s), driver ${driver}`,
      });
    } catch (error) {
      steps.push({ label: "Query telemetry", ok: false, detail: safeErrorMessage(error) });
    }
    return steps;
  }

  private async attachProcesses(snapshots: GpuSnapshot[], signal?: AbortSignal): Promise<void> {
    let output: string;
    try {
      output = await this.invoke(
        [`--query-compute-apps=${PROCESS_QUERY_FIELDS.join(",")}`, "--format=csv,noheader,nounits"],
        signal,
      );
    } catch (error) {
      this.options.logger.warn("Process query failed", { error: safeErrorMessage(error) });
      return;
    }

    const { byUuid, fieldErrors } = parseProcessQuery(output);
    if (fieldErrors.length > 0) {
      this.options.logger.debug("Skipped unparseable process rows", { count: fieldErrors.length });
    }
    for (const snapshot of snapshots) {
      snapshot.processes = snapshot.uuid ? (byUuid.get(snapshot.uuid) ?? []) : [];
    }
  }

  private async invoke(args: readonly string[], signal?: AbortSignal): Promise<string> {
    const { executable, timeoutMs } = this.options;
    try {
      const { stdout } = await this.run(executable, args, { timeoutMs, signal });
      return stdout;
    } catch (error) {
      throw classifyFailure(error, executable, timeoutMs);
    }
  }
}
