import { HttpApiBuilder } from "@effect/platform";
import { HealthCheck } from "@reward-search/infrastructure";
import { Effect } from "effect";
import { Api } from "../api.js";

export const HealthApiLive = HttpApiBuilder.group(Api, "health", (handlers) =>
  handlers.handle("check", () =>
    Effect.gen(function* () {
      const health = yield* HealthCheck;
      return yield* health.check();
    }),
  ),
);
