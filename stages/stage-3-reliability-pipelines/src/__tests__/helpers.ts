import type { PipelineLogEntry, PipelineLogger } from "../types.js";

export interface RecordedEntry {
  level: "info" | "warn";
  entry: Omit<PipelineLogEntry, "timestamp">;
}

/** In-memory logger; timestamps are checked for shape and then dropped. */
export function createRecordingLogger(): PipelineLogger & {
  entries: RecordedEntry[];
} {
  const entries: RecordedEntry[] = [];

  function record(level: "info" | "warn", entry: PipelineLogEntry): void {
    const { timestamp, ...rest } = entry;
    if (Number.isNaN(Date.parse(timestamp))) {
      throw new Error(`Invalid log timestamp: ${timestamp}`);
    }
    entries.push({ level, entry: rest });
  }

  return {
    entries,
    logInfo: (entry) => record("info", entry),
    logWarning: (entry) => record("warn", entry),
  };
}
