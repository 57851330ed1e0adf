import "dotenv/config";

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import {
  DEFAULT_LEAK_PATTERNS,
  type LabelCatalogue,
  type LeakPatternList,
} from "../stages/stage-1-label-protection/src/index.js";
import {
  type JsonSchema,
  validateAgainstSchema,
} from "../stages/stage-2-output-control/src/index.js";

export type LogLevel = "silent" | "warn" | "info";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "warn", "info"];

export const DEFAULT_LABEL_CATALOGUE_PATH = fileURLToPath(
  new URL("./label-catalogue.json", import.meta.url)
);

export interface GlobalConfig {
  labelCataloguePath?: string;
  leakPatternsPath?: string;
  logLevel?: string;
}

/** Everything a pipeline needs, passed explicitly rather than cached per process. */
export interface ReliabilityConfig {
  catalogue: LabelCatalogue;
  leakPatterns: LeakPatternList;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly path?: string;

  constructor(options: { message: string; path?: string; cause?: unknown }) {
    super(options.message, { cause: options.cause });
    this.name = "ConfigError";
    this.path = options.path;
  }
}

const LABEL_CATALOGUE_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    labels: {
      type: "array",
      items: { type: "string", minLength: 1, pattern: "^[^\\r\\n]+$" },
    },
  },
  required: ["labels"],
};

const LEAK_PATTERNS_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    patterns: {
      type: "array",
      items: { type: "string", minLength: 1 },
    },
  },
  required: ["patterns"],
};

// 从 .env 读取统一配置，避免在调用处直接读取环境变量
export function loadGlobalConfig(): GlobalConfig {
  return {
    labelCataloguePath: process.env.LABEL_CATALOGUE_PATH || undefined,
    leakPatternsPath: process.env.LEAK_PATTERNS_PATH || undefined,
    logLevel: process.env.LOG_LEVEL || undefined,
  };
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

function readJsonFile<T>(path: string, schema: JsonSchema): T {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8")) as unknown;
  } catch (err) {
    throw new ConfigError({
      message: `Cannot read config file ${path}`,
      path,
      cause: err,
    });
  }

  const validation = validateAgainstSchema<T>(data, schema);
  if (!validation.valid) {
    throw new ConfigError({
      message: `Invalid config file ${path}: ${validation.errors.join("; ")}`,
      path,
    });
  }
  return validation.data;
}

export function loadLabelCatalogue(
  path: string = DEFAULT_LABEL_CATALOGUE_PATH
): LabelCatalogue {
  return readJsonFile<{ labels: string[] }>(path, LABEL_CATALOGUE_SCHEMA)
    .labels;
}

/** Without a path, the built-in current and historical token formats. */
export function loadLeakPatterns(path?: string): LeakPatternList {
  if (!path) {
    return DEFAULT_LEAK_PATTERNS;
  }
  const { patterns } = readJsonFile<{ patterns: string[] }>(
    path,
    LEAK_PATTERNS_SCHEMA
  );
  for (const pattern of patterns) {
    try {
      new RegExp(pattern);
    } catch (err) {
      throw new ConfigError({
        message: `Invalid leak pattern ${JSON.stringify(pattern)} in ${path}`,
        path,
        cause: err,
      });
    }
  }
  return patterns;
}

// 组合 .env 与 JSON 配置，结果由调用方显式传给各 pipeline
export function loadReliabilityConfig(
  global: GlobalConfig = loadGlobalConfig()
): ReliabilityConfig {
  return {
    catalogue: loadLabelCatalogue(global.labelCataloguePath),
    leakPatterns: loadLeakPatterns(global.leakPatternsPath),
    logLevel: resolveLogLevel(global.logLevel),
  };
}
