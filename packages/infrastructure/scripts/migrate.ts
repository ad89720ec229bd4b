#!/usr/bin/env tsx
/**
 * Database migration runner
 * Creates the reward flight catalog tables on the configured database
 */

import "dotenv/config";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Effect } from "effect";
import { ConnectionPoolLive } from "../src/db/connection.js";
import { createRewardFlightTables } from "../src/db/schema.js";

const program = createRewardFlightTables.pipe(
  Effect.tap(() => Effect.logInfo("Reward flight tables are up to date")),
  Effect.tapErrorCause((cause) => Effect.logError("Migration failed", cause)),
  Effect.provide(ConnectionPoolLive),
);

NodeRuntime.runMain(program);
