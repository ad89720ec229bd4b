import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { Schema } from "effect";

const HealthStatus = Schema.Literal("healthy", "unhealthy");

export class HealthGroup extends HttpApiGroup.make("health")
  .add(
    HttpApiEndpoint.get("check", "/").addSuccess(
      Schema.Struct({
        status: HealthStatus,
        components: Schema.Array(
          Schema.Struct({
            name: Schema.String,
            status: HealthStatus,
            message: Schema.optional(Schema.String),
            latencyMs: Schema.optional(Schema.Number),
          }),
        ),
      }),
    ),
  )
  .prefix("/health") {}
