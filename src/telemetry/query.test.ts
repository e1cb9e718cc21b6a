import { describe, it, expect } from "vitest";
import { TelemetryUnavailable } from "../core/errors.js";
import {
  emptySnapshot,
  memoryPercent,
  parseGpuQuery,
  parseProcessQuery,
  powerPercent,
  processBaseName,
  type QueryField,
} from "./query.js";

const FULL_LINE =
  "0, GPU-0000-aaaa, NVIDIA GeForce RTX 4090, 550.54.14, 65, 30, 8200, 24576, 72, 285.00, 450.00, 2520, 10501, 45";

describe("parseGpuQuery", () => {
  it("parses a line in a custom field order", () => {
    const fields: QueryField[] = [
      "name",
      "utilization.gpu",
      "power.draw",
      "memory.used",
      "memory.total",
      "temperature.gpu",
    ];
    const { snapshots, fieldErrors } = parseGpuQuery("RTX 4090,65,285.00,8200,24576,72\n", fields);

    expect(fieldErrors).toEqual([]);
    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatchObject({
      index: 0,
      name: "RTX 4090",
      utilization: 65,
      power_draw: 285,
      memory_used: 8200,
      memory_total: 24576,
      temperature: 72,
      fan_speed: null,
    });
  });

  it("parses the default field list", () => {
    const { snapshots } = parseGpuQuery(`${FULL_LINE}\n`);
    expect(snapshots[0]).toEqual({
      index: 0,
      uuid: "GPU-0000-aaaa",
      name: "NVIDIA GeForce RTX 4090",
      driver_version: "550.54.14",
      utilization: 65,
      memory_utilization: 30,
      memory_used: 8200,
      memory_total: 24576,
      temperature: 72,
      power_draw: 285,
      power_limit: 450,
      clock_graphics: 2520,
      clock_memory: 10501,
      fan_speed: 45,
      processes: [],
    });
  });

  it("takes the index from the index column", () => {
    const second = FULL_LINE.replace(/^0,/, "3,");
    const { snapshots } = parseGpuQuery(`${FULL_LINE}\r\n${second}\r\n`);
    expect(snapshots.map((gpu) => gpu.index)).toEqual([0, 3]);
  });

  it("maps unknown markers to null without reporting them", () => {
    const line = "1, GPU-bbbb, Tesla T4, 535.00, [N/A], [Not Supported], 100, 15360, 40, [N/A], 70.00, 300, 5000, [N/A]";
    const { snapshots, fieldErrors } = parseGpuQuery(line);

    expect(fieldErrors).toEqual([]);
    expect(snapshots[0]).toMatchObject({
      index: 1,
      utilization: null,
      memory_utilization: null,
      power_draw: null,
      fan_speed: null,
      temperature: 40,
    });
  });

  it("reports an unparseable field and keeps the rest of the GPU", () => {
    const line = FULL_LINE.replace(", 65,", ", busy,");
    const { snapshots, fieldErrors } = parseGpuQuery(line);

    expect(snapshots[0]?.utilization).toBeNull();
    expect(snapshots[0]?.temperature).toBe(72);
    expect(fieldErrors).toHaveLength(1);
    expect(fieldErrors[0]).toMatchObject({ field: "utilization.gpu", gpuIndex: 0, raw: "busy" });
  });

  it("reports hexadecimal and exponent notation as unparseable", () => {
    const line = FULL_LINE.replace(", 65,", ", 0x10,").replace(/, 45$/, ", 1e2");
    const { snapshots, fieldErrors } = parseGpuQuery(line);

    expect(snapshots[0]?.utilization).toBeNull();
    expect(snapshots[0]?.fan_speed).toBeNull();
    expect(fieldErrors.map((error) => [error.field, error.raw])).toEqual([
      ["utilization.gpu", "0x10"],
      ["fan.speed", "1e2"],
    ]);
  });

  it("accepts signed and fractional decimals", () => {
    const line = FULL_LINE.replace(", 285.00,", ", .5,").replace(", 72,", ", +72,");
    const { snapshots, fieldErrors } = parseGpuQuery(line);

    expect(fieldErrors).toEqual([]);
    expect(snapshots[0]?.power_draw).toBe(0.5);
    expect(snapshots[0]?.temperature).toBe(72);
  });

  it("falls back to the line position for a bad index", () => {
    const line = FULL_LINE.replace(/^0,/, "x,");
    const { snapshots, fieldErrors } = parseGpuQuery(`${FULL_LINE}\n${line}`);

    expect(snapshots[1]?.index).toBe(1);
    expect(fieldErrors[0]).toMatchObject({ field: "index", raw: "x" });
  });

  it("names a GPU Unknown when the name is missing", () => {
    const line = FULL_LINE.replace("NVIDIA GeForce RTX 4090", "[N/A]");
    expect(parseGpuQuery(line).snapshots[0]?.name).toBe("Unknown");
  });

  it("rejects an empty response", () => {
    expect.assertions(3);
    expect(() => parseGpuQuery("\n  \n")).toThrow(TelemetryUnavailable);
    try {
      parseGpuQuery("");
    } catch (error) {
      expect(error).toBeInstanceOf(TelemetryUnavailable);
      expect(error).toMatchObject({ reason: "malformed", detail: "empty response" });
    }
  });

  it("rejects a line with the wrong number of columns", () => {
    expect(() => parseGpuQuery("RTX 4090, 65")).toThrow(
      "telemetry unavailable (malformed): line 1 has 2 columns, expected 14",
    );
  });
});

describe("parseProcessQuery", () => {
  it("groups processes by GPU uuid", () => {
    const text = [
      "GPU-aaaa, 1234, /usr/bin/python3, 2048",
      "GPU-aaaa, 99, C:\\Apps\\game.exe, [N/A]",
      "GPU-bbbb, 7, trainer, 512",
    ].join("\n");
    const { byUuid, fieldErrors } = parseProcessQuery(text);

    expect(fieldErrors).toEqual([]);
    expect(byUuid.get("GPU-aaaa")).toEqual([
      { pid: 1234, name: "python3", memory_used: 2048 },
      { pid: 99, name: "game.exe", memory_used: null },
    ]);
    expect(byUuid.get("GPU-bbbb")).toEqual([{ pid: 7, name: "trainer", memory_used: 512 }]);
  });

  it("keeps commas inside the process name", () => {
    const { byUuid } = parseProcessQuery("GPU-aaaa, 42, worker,gpu, 100\n");
    expect(byUuid.get("GPU-aaaa")).toEqual([{ pid: 42, name: "worker,gpu", memory_used: 100 }]);
  });

  it("skips short lines and invalid pids", () => {
    const { byUuid, fieldErrors } = parseProcessQuery("garbage\nGPU-aaaa, abc, proc, 10\nGPU-aaaa, 5, ok, 10");

    expect(fieldErrors.map((error) => error.field)).toEqual(["process", "pid"]);
    expect(byUuid.get("GPU-aaaa")).toEqual([{ pid: 5, name: "ok", memory_used: 10 }]);
  });

  it("returns nothing for an empty listing", () => {
    expect(parseProcessQuery("").byUuid.size).toBe(0);
  });
});

describe("processBaseName", () => {
  it("strips either path separator", () => {
    expect(processBaseName("/opt/app/bin/serve")).toBe("serve");
    expect(processBaseName("C:\\Tools\\render.exe")).toBe("render.exe");
    expect(processBaseName("plain")).toBe("plain");
  });
});

describe("derived percentages", () => {
  it("computes memory and power percentages", () => {
    const gpu = { ...emptySnapshot(0), memory_used: 2048, memory_total: 8192, power_draw: 150, power_limit: 300 };
    expect(memoryPercent(gpu)).toBe(25);
    expect(powerPercent(gpu)).toBe(50);
  });

  it("returns null when a term is unknown or the total is zero", () => {
    expect(memoryPercent({ ...emptySnapshot(0), memory_used: 10 })).toBeNull();
    expect(memoryPercent({ ...emptySnapshot(0), memory_used: 10, memory_total: 0 })).toBeNull();
    expect(powerPercent({ ...emptySnapshot(0), power_draw: 10, power_limit: 0 })).toBeNull();
  });
});
