import { type SqlClient, type SqlError } from "@effect/sql";
import { PgClient } from "@effect/sql-pg";
import { DatabaseConfig } from "@reward-search/config";
import { type ConfigError, Effect, Layer, Option } from "effect";

// Main Connection Layer (Production)
// DATABASE_URL wins over the individual DB_* parts when both are set
export const ConnectionPoolLive: Layer.Layer<
  SqlClient.SqlClient,
  ConfigError.ConfigError | SqlError.SqlError
> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* DatabaseConfig;

    return Option.match(config.url, {
      onSome: (url) =>
        PgClient.layer({ url, maxConnections: config.poolMax }),
      onNone: () =>
        PgClient.layer({
          host: config.host,
          port: config.port,
          database: config.database,
          username: config.user,
          password: Option.getOrUndefined(config.password),
          maxConnections: config.poolMax,
        }),
    });
  }),
);
