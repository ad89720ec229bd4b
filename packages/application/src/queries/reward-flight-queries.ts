/**
 * @file reward-flight-queries.ts
 * @module @reward-search/application/queries
 * @description Query service for reward flight searches (read side only)
 */

import { type RewardFlightSearchError } from "@reward-search/domain/errors";
import {
  type AirportCode,
  type CarrierCode,
  type CheapestCabinClass,
  type IsoDate,
} from "@reward-search/domain/kernel";
import { Context, type Effect } from "effect";
import { type Page, type PageRequest } from "../models/page.js";
import { type RewardFlight } from "../models/read-models.js";

export interface RangeSearchParams {
  readonly origin: AirportCode;
  readonly destination: AirportCode;
  readonly carrierCode: CarrierCode;
  /** Inclusive. */
  readonly fromDate: IsoDate;
  /** Inclusive. */
  readonly toDate: IsoDate;
}

export interface CheapestSearchParams {
  readonly origin: AirportCode;
  readonly destination: AirportCode;
  readonly cabinClass: CheapestCabinClass;
}

/**
 * Repository facade over the reward flight catalog.
 * Both searches fail with a single error type and never retry.
 */
export interface RewardFlightQueriesPort {
  /**
   * Flights of one carrier on a route, ordered by departure.
   */
  rangeSearch(
    params: RangeSearchParams,
    page: PageRequest,
  ): Effect.Effect<Page<RewardFlight>, RewardFlightSearchError>;

  /**
   * Flights on a route with seats in `cabinClass`, cheapest first.
   */
  cheapestSearch(
    params: CheapestSearchParams,
    page: PageRequest,
  ): Effect.Effect<Page<RewardFlight>, RewardFlightSearchError>;
}

export class RewardFlightQueries extends Context.Tag("RewardFlightQueries")<
  RewardFlightQueries,
  RewardFlightQueriesPort
>() {}
