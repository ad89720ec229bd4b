/**
 * @file reward-flight-statements.ts
 * @module @reward-search/infrastructure/queries
 * @description Count and page statements behind the reward flight searches
 *
 * Every statement runs on Postgres and SQLite: counts are cast to INTEGER
 * and departures are selected as YYYY-MM-DD text.
 */

import { type SqlClient, type SqlError, type Statement } from "@effect/sql";
import { type PageRequest } from "@reward-search/application/models/page";
import {
  type CheapestSearchParams,
  type RangeSearchParams,
} from "@reward-search/application/reward-flight-queries";
import { type CheapestCabinClass } from "@reward-search/domain/kernel";
import { Effect, Either, Schema } from "effect";
import { AwardTables, type AwardTable } from "../db/schema.js";
import { DataAccessError, type SearchKind } from "../errors.js";
import { type RewardFlightRow } from "../repositories/mappers/reward-flight.mapper.js";

/**
 * Award table ranked by a cheapest-first search, per cabin.
 */
export const CHEAPEST_CABINS = {
  ECONOMY: AwardTables.economy,
  PREMIUM_ECONOMY: AwardTables.premiumEconomy,
  BUSINESS: AwardTables.business,
} as const satisfies Record<CheapestCabinClass, AwardTable>;

interface CountRow {
  readonly total: unknown;
}

// postgres.js hands back bigint-sized numerics as strings
const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative());
const CountValue = Schema.Union(
  NonNegativeInt,
  Schema.compose(Schema.NumberFromString, NonNegativeInt),
);

export interface RewardFlightStatements {
  readonly countRange: (
    params: RangeSearchParams,
  ) => Effect.Effect<number, DataAccessError>;
  readonly pageRange: (
    params: RangeSearchParams,
    page: PageRequest,
  ) => Effect.Effect<ReadonlyArray<RewardFlightRow>, DataAccessError>;
  readonly countCheapest: (
    params: CheapestSearchParams,
  ) => Effect.Effect<number, DataAccessError>;
  readonly pageCheapest: (
    params: CheapestSearchParams,
    page: PageRequest,
  ) => Effect.Effect<ReadonlyArray<RewardFlightRow>, DataAccessError>;
}

export const makeRewardFlightStatements = (
  sql: SqlClient.SqlClient,
): RewardFlightStatements => {
  const accessError =
    (search: SearchKind, step: "count" | "page") => (cause: SqlError.SqlError) =>
      new DataAccessError({
        search,
        step,
        message: `Failed to read the ${step} of a ${search} search`,
        cause,
        timestamp: new Date(),
      });

  const readTotal =
    (search: SearchKind) =>
    (rows: ReadonlyArray<CountRow>): Effect.Effect<number, DataAccessError> =>
      Schema.decodeUnknownEither(CountValue)(rows[0]?.total).pipe(
        Either.mapLeft(
          (cause) =>
            new DataAccessError({
              search,
              step: "count",
              message: "Count query returned no readable total",
              cause,
              timestamp: new Date(),
            }),
        ),
      );

  const awardColumns = ({ alias }: AwardTable) => sql`
    ${sql(alias)}.id AS ${sql(`${alias}_id`)},
    ${sql(alias)}.cabin_points_value AS ${sql(`${alias}_cabin_points_value`)},
    ${sql(alias)}.is_saver_award AS ${sql(`${alias}_is_saver_award`)},
    ${sql(alias)}.cabin_class_seat_count AS ${sql(`${alias}_cabin_class_seat_count`)},
    ${sql(alias)}.cabin_class_seat_count_string AS ${sql(`${alias}_cabin_class_seat_count_string`)}
  `;

  const awardJoin = ({ table, alias }: AwardTable) =>
    sql`LEFT JOIN ${sql(table)} ${sql(alias)} ON ${sql(alias)}.flight_id = rfl.id`;

  // Postgres renders a DATE cast to text in the session DateStyle
  const departureText: Statement.Fragment = sql.onDialectOrElse({
    pg: () => sql`TO_CHAR(rfl.departure, 'YYYY-MM-DD')`,
    orElse: () => sql`CAST(rfl.departure AS TEXT)`,
  });

  // Flight columns followed by every cabin's prefixed award columns
  const selectRewardFlight = (filter: Statement.Fragment) => sql`
    SELECT
      rfl.id,
      rfl.origin,
      rfl.destination,
      ${departureText} AS departure,
      rfl.carrier_code,
      rfl.scraped_at,
      ${awardColumns(AwardTables.economy)},
      ${awardColumns(AwardTables.premiumEconomy)},
      ${awardColumns(AwardTables.business)},
      ${awardColumns(AwardTables.first)}
    FROM reward_flights_latest rfl
    ${awardJoin(AwardTables.economy)}
    ${awardJoin(AwardTables.premiumEconomy)}
    ${awardJoin(AwardTables.business)}
    ${awardJoin(AwardTables.first)}
    ${filter}
  `;

  const rangeFilter = (params: RangeSearchParams) => sql`
    WHERE rfl.origin = ${params.origin}
      AND rfl.destination = ${params.destination}
      AND rfl.carrier_code = ${params.carrierCode}
      AND rfl.departure BETWEEN ${params.fromDate} AND ${params.toDate}
  `;

  const cheapestFilter = (params: CheapestSearchParams) => {
    const { alias } = CHEAPEST_CABINS[params.cabinClass];
    return sql`
      WHERE rfl.origin = ${params.origin}
        AND rfl.destination = ${params.destination}
        AND ${sql(alias)}.cabin_points_value IS NOT NULL
        AND ${sql(alias)}.cabin_class_seat_count > 0
    `;
  };

  return {
    countRange: (params) =>
      sql<CountRow>`
        SELECT CAST(COUNT(*) AS INTEGER) AS total
        FROM reward_flights_latest rfl
        ${rangeFilter(params)}
      `.pipe(
        Effect.mapError(accessError("range", "count")),
        Effect.flatMap(readTotal("range")),
      ),

    pageRange: (params, page) =>
      sql<RewardFlightRow>`
        ${selectRewardFlight(rangeFilter(params))}
        ORDER BY rfl.departure ASC, rfl.id ASC
        LIMIT ${page.pageSize} OFFSET ${page.offset}
      `.pipe(Effect.mapError(accessError("range", "page"))),

    countCheapest: (params) => {
      const { table, alias } = CHEAPEST_CABINS[params.cabinClass];
      return sql<CountRow>`
        SELECT CAST(COUNT(*) AS INTEGER) AS total
        FROM reward_flights_latest rfl
        INNER JOIN ${sql(table)} ${sql(alias)} ON ${sql(alias)}.flight_id = rfl.id
        ${cheapestFilter(params)}
      `.pipe(
        Effect.mapError(accessError("cheapest", "count")),
        Effect.flatMap(readTotal("cheapest")),
      );
    },

    pageCheapest: (params, page) => {
      const { alias } = CHEAPEST_CABINS[params.cabinClass];
      return sql<RewardFlightRow>`
        ${selectRewardFlight(cheapestFilter(params))}
        ORDER BY ${sql(alias)}.cabin_points_value ASC, rfl.departure ASC, rfl.id ASC
        LIMIT ${page.pageSize} OFFSET ${page.offset}
      `.pipe(Effect.mapError(accessError("cheapest", "page")));
    },
  };
};
