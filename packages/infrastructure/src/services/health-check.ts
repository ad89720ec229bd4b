import { SqlClient } from "@effect/sql";
import { Context, Duration, Effect, Layer } from "effect";

type HealthStatus = "healthy" | "unhealthy";

interface ComponentHealth {
  readonly name: string;
  readonly status: HealthStatus;
  readonly message?: string;
  readonly latencyMs?: number;
}

export interface HealthCheckResult {
  readonly status: HealthStatus;
  readonly components: ReadonlyArray<ComponentHealth>;
}

export interface HealthCheckSignature {
  /**
   * Probes the catalog store. Never fails; an unreachable store is reported
   * as unhealthy.
   */
  readonly check: () => Effect.Effect<HealthCheckResult>;
}

const TIMEOUT = Duration.seconds(5);

const summarize = (
  components: ReadonlyArray<ComponentHealth>,
): HealthCheckResult => ({
  status: components.some((c) => c.status === "unhealthy")
    ? "unhealthy"
    : "healthy",
  components,
});

export class HealthCheck extends Context.Tag("HealthCheck")<
  HealthCheck,
  HealthCheckSignature
>() {
  /**
   * Live Layer — pings the database behind the SqlClient.
   */
  static readonly Live = Layer.effect(
    HealthCheck,
    Effect.gen(function* () {
      const sql = yield* SqlClient.SqlClient;

      const checkDatabase: Effect.Effect<ComponentHealth> = Effect.gen(
        function* () {
          const startTime = Date.now();

          yield* sql`SELECT 1 AS health_check`;

          return {
            name: "database",
            status: "healthy" as const,
            latencyMs: Date.now() - startTime,
          };
        },
      ).pipe(
        Effect.timeoutFail({
          duration: TIMEOUT,
          onTimeout: () => "database ping timed out",
        }),
        Effect.catchAll((error) =>
          Effect.logError("Health check failed for database", {
            error: String(error),
          }).pipe(
            Effect.as({
              name: "database",
              status: "unhealthy" as const,
              message: "database unavailable",
            }),
          ),
        ),
      );

      return {
        check: () =>
          checkDatabase.pipe(Effect.map((database) => summarize([database]))),
      };
    }),
  );

  /**
   * Fixture Layer — the in-memory catalog is always reachable.
   */
  static readonly Fixture = Layer.succeed(
    HealthCheck,
    HealthCheck.of({
      check: () =>
        Effect.succeed(
          summarize([
            { name: "fixture", status: "healthy", message: "in-memory catalog" },
          ]),
        ),
    }),
  );
}
