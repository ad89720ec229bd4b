import { type SqlError } from "@effect/sql";
import { type RewardFlightQueries } from "@reward-search/application/reward-flight-queries";
import { SearchConfig } from "@reward-search/config";
import { type ConfigError, Effect, Layer } from "effect";
import { ConnectionPoolLive } from "./db/connection.js";
import { FixtureRewardFlightQueries } from "./queries/fixture-reward-flight-queries.js";
import { PostgresRewardFlightQueries } from "./queries/reward-flight-queries.js";
import { HealthCheck } from "./services/health-check.js";

export { createRewardFlightTables } from "./db/schema.js";
export { ConnectionPoolLive } from "./db/connection.js";
export { FixtureRewardFlightQueries } from "./queries/fixture-reward-flight-queries.js";
export { PostgresRewardFlightQueries } from "./queries/reward-flight-queries.js";
export { HealthCheck, type HealthCheckResult } from "./services/health-check.js";

export type SearchBackendServices = RewardFlightQueries | HealthCheck;

// --- 1. Postgres: queries and health check share one connection pool ---
const PostgresBackendLive = Layer.merge(
  PostgresRewardFlightQueries.Live,
  HealthCheck.Live,
).pipe(Layer.provide(ConnectionPoolLive));

// --- 2. Fixture: no database at all ---
const FixtureBackendLive = Layer.merge(
  FixtureRewardFlightQueries.Live,
  HealthCheck.Fixture,
);

// --- 3. Selected by SEARCH_BACKEND ---
export const SearchBackendLive: Layer.Layer<
  SearchBackendServices,
  ConfigError.ConfigError | SqlError.SqlError
> = Layer.unwrapEffect(
  Effect.gen(function* () {
    const { backend } = yield* SearchConfig;
    yield* Effect.logInfo("Using search backend", { backend });
    return backend === "fixture" ? FixtureBackendLive : PostgresBackendLive;
  }),
);
