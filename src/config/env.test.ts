import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { createConfig } from "./env.js";

describe("createConfig", () => {
  it("applies defaults", () => {
    expect(createConfig({}, {})).toEqual({
      nvidia_smi: "nvidia-smi",
      log_level: "warn",
      interval_ms: 500,
      history_size: 60,
      timeout_ms: 2000,
      processes: true,
    });
  });

  it("reads flags as the argument parser hands them over", () => {
    const config = createConfig({ interval: "250", history: "30", timeout: "5000", processes: false }, {});
    expect(config).toMatchObject({ interval_ms: 250, history_size: 30, timeout_ms: 5000, processes: false });
  });

  it("reads environment variables", () => {
    const config = createConfig({}, { GPUWATCH_NVIDIA_SMI: "/opt/nvidia/bin/nvidia-smi", GPUWATCH_LOG_LEVEL: "DEBUG" });
    expect(config.nvidia_smi).toBe("/opt/nvidia/bin/nvidia-smi");
    expect(config.log_level).toBe("debug");
  });

  it("rejects an interval below the minimum", () => {
    expect(() => createConfig({ interval: "50" }, {})).toThrow(ZodError);
  });

  it("rejects a non-numeric history size", () => {
    expect(() => createConfig({ history: "lots" }, {})).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => createConfig({}, { GPUWATCH_LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});
