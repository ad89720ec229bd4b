/**
 * @file reward-flight-queries.ts
 * @module @reward-search/infrastructure/queries
 * @description CQRS read-side implementation of the reward flight searches
 */

import { SqlClient, type SqlError } from "@effect/sql";
import { type Page, paginate, type PageRequest } from "@reward-search/application/models/page";
import { type RewardFlight } from "@reward-search/application/models/read-models";
import {
  RewardFlightQueries,
  type RewardFlightQueriesPort,
} from "@reward-search/application/reward-flight-queries";
import { SearchConfig } from "@reward-search/config";
import { RewardFlightSearchError } from "@reward-search/domain/errors";
import { Effect, Layer } from "effect";
import { DataAccessError, type RowMappingError, type SearchKind } from "../errors.js";
import {
  type RewardFlightRow,
  toRewardFlight,
} from "../repositories/mappers/reward-flight.mapper.js";
import { makeRewardFlightStatements } from "./reward-flight-statements.js";

export interface RewardFlightQueriesOptions {
  /**
   * Runs the count and the page of one search in a single read-only
   * snapshot. When off, concurrent writes may skew totals against content.
   */
  readonly consistentReads: boolean;
}

const toSearchError = (
  search: SearchKind,
  error: DataAccessError | RowMappingError,
): RewardFlightSearchError =>
  error._tag === "DataAccessError"
    ? new RewardFlightSearchError({
        reason: "DataAccess",
        message: `The ${search} search could not read the catalog (${error.step})`,
      })
    : new RewardFlightSearchError({
        reason: "Mapping",
        message: `The ${search} search found an unreadable ${error.column} value`,
      });

export class PostgresRewardFlightQueries {
  /**
   * Layer over whichever SqlClient is provided.
   */
  static readonly layer = (options: RewardFlightQueriesOptions) =>
    Layer.effect(
      RewardFlightQueries,
      Effect.gen(function* () {
        const sql = yield* SqlClient.SqlClient;
        const statements = makeRewardFlightStatements(sql);

        const beginSnapshot: Effect.Effect<unknown, SqlError.SqlError> =
          sql.onDialectOrElse({
            pg: () =>
              sql`SET TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY`,
            orElse: () => Effect.void,
          });

        const consistentRead = <A>(
          search: SearchKind,
          effect: Effect.Effect<A, DataAccessError>,
        ): Effect.Effect<A, DataAccessError> =>
          options.consistentReads
            ? sql.withTransaction(Effect.zipRight(beginSnapshot, effect)).pipe(
                Effect.catchTag("SqlError", (cause) =>
                  Effect.fail(
                    new DataAccessError({
                      search,
                      step: "transaction",
                      message: `Failed to open a read snapshot for a ${search} search`,
                      cause,
                      timestamp: new Date(),
                    }),
                  ),
                ),
              )
            : effect;

        // The page query is skipped once the offset is past the total
        const countThenPage = (
          count: Effect.Effect<number, DataAccessError>,
          page: Effect.Effect<ReadonlyArray<RewardFlightRow>, DataAccessError>,
          request: PageRequest,
        ): Effect.Effect<
          readonly [number, ReadonlyArray<RewardFlightRow>],
          DataAccessError
        > =>
          Effect.flatMap(count, (total) =>
            request.offset >= total
              ? Effect.succeed([total, []] as const)
              : Effect.map(page, (rows) => [total, rows] as const),
          );

        const search = (
          kind: SearchKind,
          count: Effect.Effect<number, DataAccessError>,
          page: Effect.Effect<ReadonlyArray<RewardFlightRow>, DataAccessError>,
          request: PageRequest,
        ): Effect.Effect<Page<RewardFlight>, RewardFlightSearchError> =>
          consistentRead(kind, countThenPage(count, page, request)).pipe(
            Effect.flatMap(([total, rows]) =>
              Effect.forEach(rows, toRewardFlight).pipe(
                Effect.map((content) => paginate(content, total, request)),
              ),
            ),
            Effect.tap((page) =>
              Effect.logDebug("Reward flight search completed", {
                totalElements: page.totalElements,
                returned: page.content.length,
              }),
            ),
            Effect.tapError((error) =>
              Effect.logError("Reward flight search failed", error),
            ),
            Effect.mapError((error) => toSearchError(kind, error)),
            Effect.annotateLogs({
              search: kind,
              pageNumber: request.pageNumber,
              pageSize: request.pageSize,
            }),
            Effect.withSpan(`RewardFlightQueries.${kind}Search`, {
              attributes: {
                pageNumber: request.pageNumber,
                pageSize: request.pageSize,
              },
            }),
          );

        return {
          rangeSearch: (params, page) =>
            search(
              "range",
              statements.countRange(params),
              statements.pageRange(params, page),
              page,
            ).pipe(
              Effect.annotateLogs({
                origin: params.origin,
                destination: params.destination,
                carrierCode: params.carrierCode,
                fromDate: params.fromDate,
                toDate: params.toDate,
              }),
            ),

          cheapestSearch: (params, page) =>
            search(
              "cheapest",
              statements.countCheapest(params),
              statements.pageCheapest(params, page),
              page,
            ).pipe(
              Effect.annotateLogs({
                origin: params.origin,
                destination: params.destination,
                cabinClass: params.cabinClass,
              }),
            ),
        } satisfies RewardFlightQueriesPort;
      }),
    );

  /**
   * Live Layer — PostgreSQL implementation configured from SearchConfig.
   */
  static readonly Live = Layer.unwrapEffect(
    Effect.gen(function* () {
      const { consistentReads } = yield* SearchConfig;
      return PostgresRewardFlightQueries.layer({ consistentReads });
    }),
  );

  /**
   * Test Layer — Mock implementation answering empty pages.
   */
  static readonly Test = (overrides: Partial<RewardFlightQueriesPort> = {}) =>
    Layer.succeed(
      RewardFlightQueries,
      RewardFlightQueries.of({
        rangeSearch: (_params, page) => Effect.succeed(paginate([], 0, page)),
        cheapestSearch: (_params, page) => Effect.succeed(paginate([], 0, page)),
        ...overrides,
      }),
    );
}
