import { FieldParseError, TelemetryUnavailable } from "../core/errors.js";
import type { GpuProcess, GpuSnapshot, Reading } from "../types.js";

type NumericKey =
  | "utilization"
  | "memory_utilization"
  | "memory_used"
  | "memory_total"
  | "temperature"
  | "power_draw"
  | "power_limit"
  | "clock_graphics"
  | "clock_memory"
  | "fan_speed";

const NUMERIC_FIELDS = {
  "utilization.gpu": "utilization",
  "utilization.memory": "memory_utilization",
  "memory.used": "memory_used",
  "memory.total": "memory_total",
  "temperature.gpu": "temperature",
  "power.draw": "power_draw",
  "power.limit": "power_limit",
  "clocks.gr": "clock_graphics",
  "clocks.mem": "clock_memory",
  "fan.speed": "fan_speed",
} as const satisfies Record<string, NumericKey>;

type NumericField = keyof typeof NUMERIC_FIELDS;

/**
 * Fields understood by the `--query-gpu` parser.
 */
export type QueryField = "index" | "uuid" | "name" | "driver_version" | NumericField;

/**
 * Fields requested on every poll, in column order.
 */
export const GPU_QUERY_FIELDS: readonly QueryField[] = [
  "index",
  "uuid",
  "name",
  "driver_version",
  "utilization.gpu",
  "utilization.memory",
  "memory.used",
  "memory.total",
  "temperature.gpu",
  "power.draw",
  "power.limit",
  "clocks.gr",
  "clocks.mem",
  "fan.speed",
];

export const PROCESS_QUERY_FIELDS = ["gpu_uuid", "pid", "process_name", "used_memory"] as const;

/**
 * Result of parsing one `--query-gpu` response.
 */
export interface GpuQueryResult {
  snapshots: GpuSnapshot[];
  fieldErrors: FieldParseError[];
}

/**
 * Result of parsing one `--query-compute-apps` response, keyed by GPU uuid.
 */
export interface ProcessQueryResult {
  byUuid: Map<string, GpuProcess[]>;
  fieldErrors: FieldParseError[];
}

const isNumericField = (field: QueryField): field is NumericField => field in NUMERIC_FIELDS;

// nvidia-smi reports "[N/A]", "[Not Supported]", "[Unknown Error]" and friends.
const UNKNOWN_MARKER = /^(\[.*\]|n\/a)$/i;

const isUnknownText = (raw: string): boolean => raw.length === 0 || UNKNOWN_MARKER.test(raw);

// Plain decimal only; Number() would also take "0x10", "1e3" and "Infinity".
const DECIMAL = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Split one CSV line into trimmed cells.
 * @param line - Raw line.
 * @returns Trimmed cells.
 */
const splitLine = (line: string): string[] => line.split(",").map((value) => value.trim());

/**
 * Split provider output into non-empty lines.
 * @param text - Raw stdout.
 * @returns Lines without trailing whitespace.
 */
const splitLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);

/**
 * Parse a numeric cell.
 * @param raw - Trimmed cell text.
 * @returns The number, null for an unknown marker, or undefined when unparseable.
 */
const parseNumber = (raw: string): Reading | undefined => {
  if (isUnknownText(raw)) {
    return null;
  }
  return DECIMAL.test(raw) ? Number(raw) : undefined;
};

/**
 * Snapshot with every reading unknown.
 * @param index - GPU index.
 * @returns Blank snapshot.
 */
export const emptySnapshot = (index: number): GpuSnapshot => ({
  index,
  uuid: null,
  name: "Unknown",
  driver_version: null,
  utilization: null,
  memory_utilization: null,
  memory_used: null,
  memory_total: null,
  temperature: null,
  power_draw: null,
  power_limit: null,
  clock_graphics: null,
  clock_memory: null,
  fan_speed: null,
  processes: [],
});

/**
 * Parse `nvidia-smi --query-gpu=<fields> --format=csv,noheader,nounits` output.
 * Unparseable fields become null and are reported; a response whose shape does not
 * match the field list is rejected as a whole.
 * @param text - Raw stdout.
 * @param fields - Fields in the order they were requested.
 * @returns Snapshots in output order plus per-field errors.
 */
export const parseGpuQuery = (text: string, fields: readonly QueryField[] = GPU_QUERY_FIELDS): GpuQueryResult => {
  const lines = splitLines(text);
  if (lines.length === 0) {
    throw new TelemetryUnavailable("malformed", "empty response");
  }

  const fieldErrors: FieldParseError[] = [];
  const snapshots = lines.map((line, position) => {
    const cells = splitLine(line);
    if (cells.length !== fields.length) {
      throw new TelemetryUnavailable(
        "malformed",
        `line ${position + 1} has ${cells.length} columns, expected ${fields.length}`,
      );
    }

    let index = position;
    const indexColumn = fields.indexOf("index");
    const indexCell = indexColumn >= 0 ? cells[indexColumn] : undefined;
    if (indexCell !== undefined) {
      const parsed = Number(indexCell);
      if (DECIMAL.test(indexCell) && Number.isInteger(parsed) && parsed >= 0) {
        index = parsed;
      } else {
        fieldErrors.push(new FieldParseError("index", position, indexCell));
      }
    }

    const snapshot = emptySnapshot(index);
    fields.forEach((field, column) => {
      const raw = cells[column] ?? "";
      if (field === "index") {
        return;
      }
      if (isNumericField(field)) {
        const value = parseNumber(raw);
        if (value === undefined) {
          fieldErrors.push(new FieldParseError(field, index, raw));
        }
        snapshot[NUMERIC_FIELDS[field]] = value ?? null;
        return;
      }
      const textValue = isUnknownText(raw) ? null : raw;
      if (field === "name") {
        snapshot.name = textValue ?? "Unknown";
      } else if (field === "uuid") {
        snapshot.uuid = textValue;
      } else {
        snapshot.driver_version = textValue;
      }
    });
    return snapshot;
  });

  return { snapshots, fieldErrors };
};

/**
 * Strip directories from a process path (either separator).
 * @param path - Executable path as reported by the driver.
 * @returns File name.
 */
export const processBaseName = (path: string): string => {
  const parts = path.split(/[\\/]/).filter((part) => part.length > 0);
  return parts[parts.length - 1] ?? path;
};

/**
 * Parse `nvidia-smi --query-compute-apps=gpu_uuid,pid,process_name,used_memory` output.
 * Process names may contain commas, so the name is everything between pid and memory.
 * @param text - Raw stdout.
 * @returns Processes grouped by GPU uuid.
 */
export const parseProcessQuery = (text: string): ProcessQueryResult => {
  const byUuid = new Map<string, GpuProcess[]>();
  const fieldErrors: FieldParseError[] = [];

  splitLines(text).forEach((line, position) => {
    const cells = splitLine(line);
    const [uuid, pidText] = cells;
    if (cells.length < PROCESS_QUERY_FIELDS.length || uuid === undefined || pidText === undefined) {
      fieldErrors.push(new FieldParseError("process", position, line));
      return;
    }
    const pid = Number(pidText);
    if (!DECIMAL.test(pidText) || !Number.isInteger(pid) || pid < 0) {
      fieldErrors.push(new FieldParseError("pid", position, pidText));
      return;
    }
    const memoryText = cells[cells.length - 1] ?? "";
    const memory = parseNumber(memoryText);
    if (memory === undefined) {
      fieldErrors.push(new FieldParseError("used_memory", position, memoryText));
    }

    const processes = byUuid.get(uuid) ?? [];
    processes.push({
      pid,
      name: processBaseName(cells.slice(2, -1).join(",")),
      memory_used: memory ?? null,
    });
    byUuid.set(uuid, processes);
  });

  return { byUuid, fieldErrors };
};

/**
 * Used memory as a percentage of total.
 * @param snapshot - GPU snapshot.
 * @returns Percentage or null.
 */
export const memoryPercent = (snapshot: GpuSnapshot): Reading => {
  const { memory_used: used, memory_total: total } = snapshot;
  if (used === null || total === null || total <= 0) {
    return null;
  }
  return (used / total) * 100;
};

/**
 * Power draw as a percentage of the enforced limit.
 * @param snapshot - GPU snapshot.
 * @returns Percentage or null.
 */
export const powerPercent = (snapshot: GpuSnapshot): Reading => {
  const { power_draw: draw, power_limit: limit } = snapshot;
  if (draw === null || limit === null || limit <= 0) {
    return null;
  }
  return (draw / limit) * 100;
};
