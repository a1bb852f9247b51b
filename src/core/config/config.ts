// src/core/config/config.ts
// Configuration for the compiler, pretty-printer and logger.
// Layering: defaults < environment < config file < explicit overrides.

import * as fs from "fs";
import * as path from "path";
import { isLogLevelName, type LogLevelName } from "../logger";

// =========================================================================
// Configuration Types
// =========================================================================

export type NewLine = "lf" | "crlf";

export type CompilerConfig = {
  /** Program mode returns `{ value, exports }` with the top-level defn functions */
  exports: boolean;
  /** Line ending of printed JavaScript */
  newLine: NewLine;
};

export type FormatConfig = {
  /** Spaces per nesting level */
  indent: number;
  /** Longest list kept on one line */
  maxInline: number;
};

export type LogConfig = {
  level: LogLevelName;
};

export type LispenConfig = {
  compiler: CompilerConfig;
  format: FormatConfig;
  log: LogConfig;
};

export type PartialConfig = {
  compiler?: Partial<CompilerConfig>;
  format?: Partial<FormatConfig>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  exports: false,
  newLine: "lf",
};

export const DEFAULT_FORMAT_CONFIG: FormatConfig = {
  indent: 2,
  maxInline: 3,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: LispenConfig = {
  compiler: DEFAULT_COMPILER_CONFIG,
  format: DEFAULT_FORMAT_CONFIG,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["lispen.config.json", "lispen.config.yaml", "lispen.config.yml"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =========================================================================
// Field readers
// =========================================================================

type Raw = Record<string, unknown>;

function isRecord(x: unknown): x is Raw {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** First of the given keys present on `obj` (camelCase and snake_case spellings). */
function field(obj: Raw, ...keys: string[]): unknown {
  for (const k of keys) {
    if (obj[k] !== undefined) return obj[k];
  }
  return undefined;
}

function asInt(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isInteger(v)) return v;
  if (typeof v === "string" && /^-?\d+$/.test(v.trim())) return parseInt(v, 10);
  return undefined;
}

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return undefined;
}

function asNewLine(v: unknown): NewLine | undefined {
  return v === "lf" || v === "crlf" ? v : undefined;
}

function asLevel(v: unknown): LogLevelName | undefined {
  if (typeof v !== "string") return undefined;
  const name = v.toLowerCase();
  return isLogLevelName(name) ? name : undefined;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables (`LISPEN_EXPORTS`,
 * `LISPEN_NEWLINE`, `LISPEN_INDENT`, `LISPEN_MAX_INLINE`, `LISPEN_LOG_LEVEL`).
 */
export function configFromEnv(prefix = "LISPEN", env: NodeJS.ProcessEnv = process.env): PartialConfig {
  return {
    compiler: {
      exports: asBool(env[`${prefix}_EXPORTS`]),
      newLine: asNewLine(env[`${prefix}_NEWLINE`]),
    },
    format: {
      indent: asInt(env[`${prefix}_INDENT`]),
      maxInline: asInt(env[`${prefix}_MAX_INLINE`]),
    },
    log: {
      level: asLevel(env[`${prefix}_LOG_LEVEL`]),
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) throw new ConfigError(`Config file must hold an object: ${filePath}`);
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Fields of the wrong type are left to the lower layers.
 */
export function configFromObject(data: Raw): PartialConfig {
  const compiler = field(data, "compiler");
  const format = field(data, "format");
  const log = field(data, "log");
  const c: Raw = isRecord(compiler) ? compiler : {};
  const f: Raw = isRecord(format) ? format : {};
  const l: Raw = isRecord(log) ? log : {};

  return {
    compiler: {
      exports: asBool(field(c, "exports")),
      newLine: asNewLine(field(c, "newLine", "new_line")),
    },
    format: {
      indent: asInt(field(f, "indent")),
      maxInline: asInt(field(f, "maxInline", "max_inline")),
    },
    log: {
      level: asLevel(field(l, "level")),
    },
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): LispenConfig {
  const result: LispenConfig = {
    compiler: { ...DEFAULT_CONFIG.compiler },
    format: { ...DEFAULT_CONFIG.format },
    log: { ...DEFAULT_CONFIG.log },
  };

  // field by field: a layer that leaves a field undefined keeps the lower value
  for (const cfg of configs) {
    result.compiler = {
      exports: cfg.compiler?.exports ?? result.compiler.exports,
      newLine: cfg.compiler?.newLine ?? result.compiler.newLine,
    };
    result.format = {
      indent: cfg.format?.indent ?? result.format.indent,
      maxInline: cfg.format?.maxInline ?? result.format.maxInline,
    };
    result.log = {
      level: cfg.log?.level ?? result.log.level,
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): LispenConfig {
  const layers: PartialConfig[] = [configFromEnv("LISPEN", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((p) => path.join(cwd, p)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) layers.push(options.overrides);

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Raw {
  const result: Raw = {};
  const stack: Array<{ obj: Raw; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }
    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Raw = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: LispenConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.format.indent < 0 || config.format.indent > 8) {
    errors.push("format.indent must be between 0 and 8");
  }
  if (config.format.maxInline < 0) {
    errors.push("format.maxInline must not be negative");
  }
  if (config.format.indent === 0) {
    warnings.push("format.indent is 0, nested lists will not be indented");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
