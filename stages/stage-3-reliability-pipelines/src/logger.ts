import type { LogLevel } from "../../../config/index.js";
import type { PipelineLogEntry, PipelineLogger } from "./types.js";

function toJson(entry: PipelineLogEntry): string {
  return JSON.stringify(entry);
}

export function createConsoleLogger(level: LogLevel = "info"): PipelineLogger {
  return {
    logInfo(entry: PipelineLogEntry) {
      if (level === "info") {
        console.log(toJson(entry));
      }
    },
    logWarning(entry: PipelineLogEntry) {
      if (level === "info" || level === "warn") {
        console.warn(toJson(entry));
      }
    },
  };
}

export function nowIso(): string {
  return new Date().toISOString();
}
