// worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  ENTITY: "info",
  COMBAT: "info",
};

// Allow env overrides like LOG_SCOPE_ENTITY=debug, LOG_SCOPE_CODEC=warn, etc.
export function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Default table
  const fromTable = PER_SCOPE_DEFAULTS[key];
  if (fromTable) return fromTable;

  // 3) Global fallback, read late so tests can flip LOG_LEVEL
  return parseLevel(process.env.LOG_LEVEL) ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
