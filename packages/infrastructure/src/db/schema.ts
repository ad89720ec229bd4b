import { SqlClient } from "@effect/sql";
import { Effect } from "effect";

export const REWARD_FLIGHTS_TABLE = "reward_flights_latest";

export interface AwardTable {
  readonly table: string;
  /** Join alias, also the column prefix of the table in search rows. */
  readonly alias: string;
}

// Satellite tables, one award row per flight and cabin
export const AwardTables = {
  economy: { table: "award_economy", alias: "ae" },
  premiumEconomy: { table: "award_premium_economy", alias: "ape" },
  business: { table: "award_business", alias: "ab" },
  first: { table: "award_first", alias: "af" },
} as const satisfies Record<string, AwardTable>;

/**
 * Creates the catalog tables and lookup indexes.
 * Idempotent, and written to run unchanged on Postgres and SQLite.
 */
export const createRewardFlightTables = Effect.gen(function* () {
  const sql = yield* SqlClient.SqlClient;

  yield* sql`
    CREATE TABLE IF NOT EXISTS ${sql(REWARD_FLIGHTS_TABLE)} (
      id INTEGER PRIMARY KEY,
      origin VARCHAR(3) NOT NULL,
      destination VARCHAR(3) NOT NULL,
      departure DATE NOT NULL,
      carrier_code VARCHAR(3) NOT NULL,
      scraped_at TIMESTAMPTZ NOT NULL
    )
  `;

  yield* sql`
    CREATE INDEX IF NOT EXISTS idx_reward_flights_route
    ON ${sql(REWARD_FLIGHTS_TABLE)} (origin, destination, carrier_code, departure)
  `;

  for (const { table } of Object.values(AwardTables)) {
    yield* sql`
      CREATE TABLE IF NOT EXISTS ${sql(table)} (
        id INTEGER PRIMARY KEY,
        flight_id INTEGER NOT NULL UNIQUE REFERENCES ${sql(REWARD_FLIGHTS_TABLE)} (id),
        cabin_points_value INTEGER,
        is_saver_award BOOLEAN,
        cabin_class_seat_count INTEGER,
        cabin_class_seat_count_string TEXT
      )
    `;
  }
}).pipe(Effect.withSpan("createRewardFlightTables"));
