import { CarrierCodeSchema, IsoDateSchema } from "@reward-search/domain/kernel";
import { Config, ConfigError, Either, LogLevel, Redacted, Schema } from "effect";

// ============================================================================
// Helpers
// ============================================================================

const isDevOrTest =
  process.env.NODE_ENV === "development" || process.env.NODE_ENV === "test";

/**
 * Creates a redacted configuration value with a fallback for development/test.
 */
export const secret = (name: string, mock?: string) => {
  const config = Config.redacted(name);
  if (isDevOrTest && mock) {
    return config.pipe(Config.withDefault(Redacted.make(mock)));
  }
  return config;
};

const SENSITIVE_KEY_PATTERNS = ["password", "secret", "token", "url"];

/**
 * Helper to redact sensitive values in logs.
 * Connection URLs are redacted too since they embed credentials.
 */
export function redactSensitiveConfig(config: unknown): unknown {
  if (config === null || config === undefined) {
    return config;
  }

  if (Redacted.isRedacted(config)) {
    return "<redacted>";
  }

  if (Array.isArray(config)) {
    return config.map(redactSensitiveConfig);
  }

  if (typeof config === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      const lowerKey = key.toLowerCase();
      result[key] = SENSITIVE_KEY_PATTERNS.some((p) => lowerKey.includes(p))
        ? "<redacted>"
        : redactSensitiveConfig(value);
    }
    return result;
  }

  return config;
}

const pageSize = (name: string, fallback: number) =>
  Config.integer(name).pipe(
    Config.validate({
      message: `${name} must be an integer of at least 1`,
      validation: (size) => size >= 1,
    }),
    Config.withDefault(fallback),
  );

// ============================================================================
// Shared Configs
// ============================================================================

const nodeEnv = Config.string("NODE_ENV").pipe(
  Config.withDefault("development"),
);

// ============================================================================
// Database Config
// ============================================================================

export const DatabaseConfig = Config.all({
  host: Config.string("DB_HOST").pipe(Config.withDefault("localhost")),
  port: Config.integer("DB_PORT").pipe(Config.withDefault(5432)),
  database: Config.string("DB_NAME").pipe(Config.withDefault("rewards")),
  user: Config.string("DB_USER").pipe(Config.withDefault("postgres")),
  password: secret("DB_PASSWORD", "postgres").pipe(Config.option),
  poolMax: Config.integer("DB_POOL_MAX").pipe(Config.withDefault(10)),
  url: Config.redacted("DATABASE_URL").pipe(Config.option),
});

export type DatabaseConfig = Config.Config.Success<typeof DatabaseConfig>;

// ============================================================================
// Search Config
// ============================================================================

export const SearchBackend = Config.literal("postgres", "fixture");

export const SearchConfig = Config.all({
  backend: SearchBackend("SEARCH_BACKEND").pipe(Config.withDefault("postgres")),
  carrierCode: Schema.Config("SEARCH_CARRIER_CODE", CarrierCodeSchema).pipe(
    Config.withDefault(CarrierCodeSchema.make("VS")),
  ),
  rangePageSize: pageSize("SEARCH_RANGE_PAGE_SIZE", 10),
  cheapestPageSize: pageSize("SEARCH_CHEAPEST_PAGE_SIZE", 50),
  consistentReads: Config.boolean("SEARCH_CONSISTENT_READS").pipe(
    Config.withDefault(true),
  ),
  fixtureAnchorDate: Schema.Config("FIXTURE_ANCHOR_DATE", IsoDateSchema).pipe(
    Config.withDefault(IsoDateSchema.make("2025-01-01")),
  ),
});

export type SearchConfig = Config.Config.Success<typeof SearchConfig>;

// ============================================================================
// API Config
// ============================================================================

export const ApiConfig = Config.all({
  port: Config.integer("PORT").pipe(Config.withDefault(8086)),
  corsOrigins: Config.all([
    nodeEnv,
    Config.array(Config.string()).pipe(
      Config.withDefault([] as Array<string>),
      Config.nested("CORS_ORIGINS"),
    ),
  ]).pipe(
    Config.mapOrFail(([env, origins]) => {
      if (env !== "development" && env !== "test" && origins.length === 0) {
        return Either.left(
          ConfigError.InvalidData(
            [],
            "CORS_ORIGINS must be explicitly set in non-development environments",
          ),
        );
      }
      return Either.right(origins);
    }),
  ),
  nodeEnv,
});

export type ApiConfig = Config.Config.Success<typeof ApiConfig>;

// ============================================================================
// Logging Config
// ============================================================================

export const LoggingConfig = Config.all({
  level: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
});

export type LoggingConfig = Config.Config.Success<typeof LoggingConfig>;

// ============================================================================
// Combined Configs
// ============================================================================

/**
 * Full application configuration, logged once at start-up.
 */
export const AppConfig = Config.all({
  api: ApiConfig,
  database: DatabaseConfig,
  search: SearchConfig,
  logging: LoggingConfig,
});

export type AppConfig = Config.Config.Success<typeof AppConfig>;
