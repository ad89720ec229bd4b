import "dotenv/config";
import { createServer } from "node:http";
import { HttpApiBuilder, HttpMiddleware, HttpServer } from "@effect/platform";
import * as NodeHttpServer from "@effect/platform-node/NodeHttpServer";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import {
  ApiConfig,
  AppConfig,
  LoggingConfig,
  redactSensitiveConfig,
} from "@reward-search/config";
import { SearchBackendLive } from "@reward-search/infrastructure";
import { ConfigProvider, Effect, Layer, Logger } from "effect";
import { Api } from "./api.js";
import { HealthApiLive } from "./health/api-live.js";
import { RewardFlightsApiLive } from "./reward-flights/api-live.js";

// ============================================================================
// Layer Hierarchy
// ============================================================================

/**
 * 1. Search backend (Postgres catalog or in-memory fixture)
 */
const HandlersLive = Layer.mergeAll(RewardFlightsApiLive, HealthApiLive);

const ApiLive = HttpApiBuilder.api(Api).pipe(
  Layer.provide(HandlersLive),
  Layer.provide(SearchBackendLive),
);

/**
 * 2. HTTP server. The API is read-only, so only GET crosses origins.
 */
const ServerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const config = yield* ApiConfig;
    return HttpApiBuilder.serve(
      HttpMiddleware.cors({
        allowedOrigins: config.corsOrigins,
        allowedMethods: ["GET"],
        allowedHeaders: ["Content-Type", "B3", "traceparent"],
      }),
    ).pipe(
      HttpServer.withLogAddress,
      Layer.provide(ApiLive),
      Layer.provide(NodeHttpServer.layer(createServer, { port: config.port })),
    );
  }),
);

/**
 * 3. Startup banner with secrets masked
 */
const StartupLogLive = Layer.effectDiscard(
  Effect.gen(function* () {
    const config = yield* AppConfig;
    yield* Effect.logInfo("Starting reward flight search", {
      config: redactSensitiveConfig(config),
    });
  }),
);

const LoggingLive = Layer.unwrapEffect(
  Effect.map(LoggingConfig, ({ level }) => Logger.minimumLogLevel(level)),
);

const ConfigProviderLive = Layer.setConfigProvider(ConfigProvider.fromEnv());

const MainLive = Layer.mergeAll(StartupLogLive, ServerLive);

// ============================================================================
// Execution Entry Point
// ============================================================================

const program = Effect.scoped(Layer.launch(MainLive)).pipe(
  Effect.catchAllCause((cause) =>
    Effect.logFatal("Fatal error in main program", cause).pipe(
      Effect.flatMap(() => Effect.failCause(cause)),
    ),
  ),
  Effect.onInterrupt(() => Effect.logInfo("Shutting down reward flight search")),
  Effect.provide(LoggingLive),
  Effect.provide(ConfigProviderLive),
);

NodeRuntime.runMain(program);
