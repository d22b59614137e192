import "dotenv/config";

export class ConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigError";
  }
}

export interface Config {
  // Server
  port: number;
  nodeEnv: string;
  isDev: boolean;

  // Supabase
  supabaseUrl: string;
  supabaseServiceRoleKey: string;

  // Google AI (Gemini)
  googleApiKey: string;
  aiModel: string;
  aiTimeoutMs: number;
}

type EnvSource = Record<string, string | undefined>;

const REQUIRED_VARS = [
  "SUPABASE_URL",
  "SUPABASE_SERVICE_ROLE_KEY",
  "GOOGLE_GENERATIVE_AI_API_KEY",
] as const;

function optionalEnv(source: EnvSource, name: string, defaultValue: string): string {
  return source[name] || defaultValue;
}

// Timers overflow past 2^31 - 1 ms and fire at once
const MAX_TIMEOUT_MS = 600_000;

function intEnv(source: EnvSource, name: string, defaultValue: number, max = Number.MAX_SAFE_INTEGER): number {
  const parsed = parseInt(optionalEnv(source, name, String(defaultValue)), 10);
  if (Number.isNaN(parsed) || parsed <= 0) return defaultValue;
  return Math.min(parsed, max);
}

/**
 * Read the service configuration from `source`.
 * Throws a ConfigError naming (never printing) every missing variable.
 */
export function loadConfig(source: EnvSource = process.env): Readonly<Config> {
  const missing = REQUIRED_VARS.filter((name) => !source[name]);
  if (missing.length > 0) {
    throw new ConfigError([...missing]);
  }

  const required = (name: (typeof REQUIRED_VARS)[number]): string => source[name] ?? "";
  const nodeEnv = optionalEnv(source, "NODE_ENV", "production");

  return Object.freeze({
    port: intEnv(source, "PORT", 8080),
    nodeEnv,
    isDev: nodeEnv === "development",

    supabaseUrl: required("SUPABASE_URL"),
    supabaseServiceRoleKey: required("SUPABASE_SERVICE_ROLE_KEY"),

    googleApiKey: required("GOOGLE_GENERATIVE_AI_API_KEY"),
    aiModel: optionalEnv(source, "AI_MODEL", "gemini-2.5-flash"),
    aiTimeoutMs: intEnv(source, "AI_TIMEOUT_MS", 30_000, MAX_TIMEOUT_MS),
  });
}

/** Names (not values) of the variables present, for startup diagnostics. */
export function availableEnvKeys(source: EnvSource = process.env): string {
  return Object.keys(source)
    .filter((k) => !k.startsWith("npm_") && !k.startsWith("_"))
    .sort()
    .join(", ");
}
