import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { z } from "zod";
import type { AppConfig, StoreBackend } from "./types.js";
import { NOTIFICATION_EVENT_NAMES } from "./types.js";
import type { Logger } from "./logger.js";
import { createRootLogger, isLogLevel } from "./logger.js";
import { MAX_REQUIRED_APPROVALS, MIN_REQUIRED_APPROVALS } from "./protocol/records.js";

export interface ConfigError {
  field: string;
  message: string;
  severity: "error" | "warning";
}

export function validateConfig(config: AppConfig): ConfigError[] {
  const errors: ConfigError[] = [];

  const approvals = config.engine.defaultRequiredApprovals;
  if (!Number.isInteger(approvals) || approvals < MIN_REQUIRED_APPROVALS || approvals > MAX_REQUIRED_APPROVALS) {
    errors.push({
      field: "engine.defaultRequiredApprovals",
      message: `Must be an integer between ${MIN_REQUIRED_APPROVALS} and ${MAX_REQUIRED_APPROVALS}`,
      severity: "error",
    });
  }

  if (config.store.backend !== "memory" && !config.store.path.trim()) {
    errors.push({ field: "store.path", message: `Required when store.backend is "${config.store.backend}"`, severity: "error" });
  }
  if (config.store.backend === "memory") {
    errors.push({ field: "store.backend", message: "In-memory store loses all pull requests on restart", severity: "warning" });
  }

  if (config.audit.maxEntries < 1) {
    errors.push({ field: "audit.maxEntries", message: "Must be >= 1", severity: "error" });
  }
  if (config.audit.enabled && !config.audit.filePath.trim()) {
    errors.push({ field: "audit.filePath", message: "Required when audit.enabled is true", severity: "error" });
  }

  if (config.notifications.enabled && config.notifications.events.length === 0) {
    errors.push({ field: "notifications.events", message: "Empty list: no event will be delivered", severity: "warning" });
  }

  return errors;
}

export const DEFAULTS: AppConfig = {
  logLevel: "info",
  engine: { defaultRequiredApprovals: 2 },
  store: { backend: "json", path: "data/pull-requests.json" },
  notifications: { enabled: true, logEvents: true, events: [...NOTIFICATION_EVENT_NAMES] },
  audit: {
    enabled: false,
    maxEntries: 10_000,
    filePath: "data/audit.json",
    includeMetadata: true,
    minSeverity: "info",
  },
};

const STORE_BACKENDS = ["memory", "json", "sqlite"] as const;

// Shape of config.yaml: every section optional, unknown keys rejected
const FileConfigSchema = z
  .object({
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    engine: z.object({ defaultRequiredApprovals: z.number() }).partial().strict(),
    store: z.object({ backend: z.enum(STORE_BACKENDS), path: z.string() }).partial().strict(),
    notifications: z
      .object({
        enabled: z.boolean(),
        logEvents: z.boolean(),
        events: z.array(z.enum(NOTIFICATION_EVENT_NAMES)),
      })
      .partial()
      .strict(),
    audit: z
      .object({
        enabled: z.boolean(),
        maxEntries: z.number(),
        filePath: z.string(),
        includeMetadata: z.boolean(),
        minSeverity: z.enum(["info", "warning", "error"]),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

function isStoreBackend(value: string): value is StoreBackend {
  return STORE_BACKENDS.some((backend) => backend === value);
}

function readFileConfig(path: string, logger: Logger): FileConfig {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
    logger.warn("Config file not found, using defaults + env vars", { path });
    return {};
  }

  const result = FileConfigSchema.safeParse(parse(raw) ?? {});
  if (!result.success) {
    const details = result.error.issues.map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`).join("\n");
    throw new Error(`Invalid config file ${path}:\n${details}`);
  }
  return result.data;
}

export function loadConfig(path: string = "config.yaml", logger: Logger = createRootLogger()): AppConfig {
  const fileConfig = readFileConfig(path, logger);

  const config: AppConfig = {
    logLevel: fileConfig.logLevel ?? DEFAULTS.logLevel,
    engine: { ...DEFAULTS.engine, ...fileConfig.engine },
    store: { ...DEFAULTS.store, ...fileConfig.store },
    notifications: { ...DEFAULTS.notifications, ...fileConfig.notifications },
    audit: { ...DEFAULTS.audit, ...fileConfig.audit },
  };

  // Environment variable overrides
  const env = process.env;
  const logLevel = env.LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid LOG_LEVEL: "${logLevel}". Must be one of: debug, info, warn, error`);
    }
    config.logLevel = logLevel;
  }
  const backend = env.STORE_BACKEND;
  if (backend) {
    if (!isStoreBackend(backend)) {
      throw new Error(`Invalid STORE_BACKEND: "${backend}". Must be one of: ${STORE_BACKENDS.join(", ")}`);
    }
    config.store.backend = backend;
  }
  if (env.STORE_PATH) {
    config.store.path = env.STORE_PATH;
  }
  if (env.DEFAULT_REQUIRED_APPROVALS) {
    const count = Number(env.DEFAULT_REQUIRED_APPROVALS);
    if (!Number.isInteger(count)) {
      throw new Error(`Invalid DEFAULT_REQUIRED_APPROVALS: "${env.DEFAULT_REQUIRED_APPROVALS}" (must be an integer)`);
    }
    config.engine.defaultRequiredApprovals = count;
  }
  if (env.AUDIT_ENABLED) {
    config.audit.enabled = env.AUDIT_ENABLED === "true" || env.AUDIT_ENABLED === "1";
  }
  if (env.AUDIT_FILE) {
    config.audit.filePath = env.AUDIT_FILE;
  }

  // Validate config
  const validationErrors = validateConfig(config);
  const fatalErrors = validationErrors.filter((e) => e.severity === "error");
  const warnings = validationErrors.filter((e) => e.severity === "warning");

  for (const w of warnings) {
    logger.warn("Config warning", { field: w.field, message: w.message });
  }
  if (fatalErrors.length > 0) {
    const details = fatalErrors.map((e) => `  ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return config;
}
