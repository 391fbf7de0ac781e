type LogLevel = "debug" | "info" | "warn" | "error";
type LogScope = "app" | "http" | "git" | "pages";

type LogEnvironment = Record<string, string | undefined>;

export type LoggingConfig = {
  level: LogLevel;
  muted: boolean;
  scopes: Record<LogScope, boolean>;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const DEFAULT_LEVEL: LogLevel = "info";

const SCOPE_SETTINGS: Record<LogScope, { envKey: string; enabledByDefault: boolean }> = {
  app: { envKey: "GITVIEW_LOG_APP", enabledByDefault: true },
  http: { envKey: "GITVIEW_LOG_HTTP", enabledByDefault: true },
  git: { envKey: "GITVIEW_LOG_GIT", enabledByDefault: false },
  pages: { envKey: "GITVIEW_LOG_PAGES", enabledByDefault: false },
};

const ENV_FLAG_VALUES = new Map<string, boolean>([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

const METADATA_LIMITS = {
  stringLength: 200,
  arrayItems: 25,
  objectKeys: 25,
  depth: 3,
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.info(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function parseBooleanEnvFlag(rawValue: string | undefined, defaultValue: boolean): boolean {
  if (rawValue === undefined) {
    return defaultValue;
  }

  return ENV_FLAG_VALUES.get(rawValue.trim().toLowerCase()) ?? defaultValue;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(rawValue: string | undefined): LogLevel {
  const normalized = rawValue?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : DEFAULT_LEVEL;
}

// Test runs are muted unless GITVIEW_LOG_FORCE is set.
export function readLoggingConfig(env: LogEnvironment = process.env): LoggingConfig {
  const testRuntime = env.NODE_ENV === "test" || env.VITEST === "true";
  const forced = parseBooleanEnvFlag(env.GITVIEW_LOG_FORCE, false);
  const scopeEnabled = (scope: LogScope): boolean => {
    const { envKey, enabledByDefault } = SCOPE_SETTINGS[scope];
    return parseBooleanEnvFlag(env[envKey], enabledByDefault);
  };

  return {
    level: parseLogLevel(env.GITVIEW_LOG_LEVEL),
    muted: testRuntime && !forced,
    scopes: {
      app: scopeEnabled("app"),
      http: scopeEnabled("http"),
      git: scopeEnabled("git"),
      pages: scopeEnabled("pages"),
    },
  };
}

export function isLogScopeEnabled(scope: LogScope): boolean {
  const config = readLoggingConfig();
  return !config.muted && config.scopes[scope];
}

function truncateString(value: string): string {
  const { stringLength } = METADATA_LIMITS;
  return value.length > stringLength
    ? `${value.slice(0, stringLength)}... (truncated, len=${value.length})`
    : value;
}

function sanitizeScalar(value: unknown): unknown {
  switch (typeof value) {
    case "string":
      return truncateString(value);
    case "number":
    case "boolean":
    case "undefined":
      return value;
    case "bigint":
      return Number(value);
    default:
      return String(value);
  }
}

function sanitizeMetadata(value: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (value === null) {
    return null;
  }

  if (typeof value !== "object") {
    return sanitizeScalar(value);
  }

  if (depth >= METADATA_LIMITS.depth) {
    return "[max-depth]";
  }

  if (seen.has(value)) {
    return "[circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    const items = value
      .slice(0, METADATA_LIMITS.arrayItems)
      .map((item: unknown) => sanitizeMetadata(item, depth + 1, seen));
    const hidden = value.length - METADATA_LIMITS.arrayItems;
    return hidden > 0 ? [...items, `[+${hidden} more]`] : items;
  }

  const entries = Object.entries(value);
  const output: Record<string, unknown> = Object.fromEntries(
    entries
      .slice(0, METADATA_LIMITS.objectKeys)
      .map(([key, entryValue]) => [key, sanitizeMetadata(entryValue, depth + 1, seen)]),
  );

  if (entries.length > METADATA_LIMITS.objectKeys) {
    output.__truncatedKeys = entries.length - METADATA_LIMITS.objectKeys;
  }

  return output;
}

function stringifyMetadata(metadata: Record<string, unknown> | undefined): string | null {
  if (!metadata || Object.keys(metadata).length === 0) {
    return null;
  }

  try {
    return JSON.stringify(sanitizeMetadata(metadata, 0, new WeakSet()));
  } catch {
    return "[unserializable-metadata]";
  }
}

export function formatLogLine(
  timestamp: string,
  scope: LogScope,
  message: string,
  metadata?: Record<string, unknown>,
): string {
  const parts = [`[${timestamp}]`, `[${scope}]`, message];
  const metadataChunk = stringifyMetadata(metadata);

  if (metadataChunk !== null) {
    parts.push(metadataChunk);
  }

  return parts.join(" ");
}

export function logEvent(
  scope: LogScope,
  level: LogLevel,
  message: string,
  metadata?: Record<string, unknown>,
) {
  const config = readLoggingConfig();

  if (config.muted || !config.scopes[scope]) {
    return;
  }

  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(config.level)) {
    return;
  }

  CONSOLE_WRITERS[level](formatLogLine(new Date().toISOString(), scope, message, metadata));
}

export function getLoggingConfigSnapshot(): Record<string, unknown> {
  const { level, scopes } = readLoggingConfig();
  return { level, scopes };
}

export type { LogLevel, LogScope };
