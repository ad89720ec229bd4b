/**
 * @file fixture-reward-flight-queries.ts
 * @module @reward-search/infrastructure/queries
 * @description Deterministic in-memory catalog for demos and contract tests
 */

import { paginate, paginateAll } from "@reward-search/application/models/page";
import {
  AwardOffer,
  RewardFlight,
} from "@reward-search/application/models/read-models";
import {
  RewardFlightQueries,
  type RewardFlightQueriesPort,
} from "@reward-search/application/reward-flight-queries";
import { SearchConfig } from "@reward-search/config";
import {
  addDays,
  type AirportCode,
  type CarrierCode,
  type CheapestCabinClass,
  countDays,
  type IsoDate,
} from "@reward-search/domain/kernel";
import { Array, Effect, Layer, Option, Order } from "effect";

export interface FixtureOptions {
  /** First departure of cheapest-search results. */
  readonly anchorDate: IsoDate;
  /** Carrier of cheapest-search results. */
  readonly carrierCode: CarrierCode;
}

const CHEAPEST_FLIGHT_COUNT = 10;

interface OfferSpec {
  readonly id: string;
  readonly points: number;
  readonly saver: boolean;
  readonly seats: number;
}

const offer = ({ id, points, saver, seats }: OfferSpec) =>
  Option.some(
    new AwardOffer({
      id,
      cabinPointsValue: Option.some(points),
      isSaverAward: Option.some(saver),
      cabinClassSeatCount: Option.some(seats),
      cabinClassSeatCountString: Option.some(String(seats)),
    }),
  );

const pointsIn = (
  flight: RewardFlight,
  cabin: CheapestCabinClass,
): Option.Option<number> => {
  const slot =
    cabin === "ECONOMY"
      ? flight.awardEconomy
      : cabin === "PREMIUM_ECONOMY"
        ? flight.awardPremiumEconomy
        : flight.awardBusiness;
  return Option.flatMap(slot, (award) => award.cabinPointsValue);
};

const byCheapest = (cabin: CheapestCabinClass): Order.Order<RewardFlight> =>
  Order.combine(
    Order.mapInput(Option.getOrder(Order.number), (flight: RewardFlight) =>
      pointsIn(flight, cabin),
    ),
    Order.mapInput(Order.string, (flight: RewardFlight) => flight.departure),
  );

export class FixtureRewardFlightQueries {
  /**
   * Range search: one flight per day of the range, with economy, premium
   * economy and business offers. Cheapest search: ten flights from the
   * anchor date with points rising day by day.
   */
  static readonly layer = (options: FixtureOptions) => {
    const scrapedAt = new Date(`${options.anchorDate}T06:00:00.000Z`);

    const flight = (
      id: string,
      origin: AirportCode,
      destination: AirportCode,
      departure: IsoDate,
      carrierCode: CarrierCode,
      points: { economy: number; premiumEconomy: number; business: number },
    ) =>
      new RewardFlight({
        id,
        origin,
        destination,
        departure,
        carrierCode,
        scrapedAt,
        awardEconomy: offer({
          id: `${id}-economy`,
          points: points.economy,
          saver: true,
          seats: 5,
        }),
        awardPremiumEconomy: offer({
          id: `${id}-premium-economy`,
          points: points.premiumEconomy,
          saver: true,
          seats: 3,
        }),
        awardBusiness: offer({
          id: `${id}-business`,
          points: points.business,
          saver: false,
          seats: 2,
        }),
        awardFirst: Option.none(),
      });

    return Layer.succeed(
      RewardFlightQueries,
      RewardFlightQueries.of({
        rangeSearch: (params, page) =>
          Effect.sync(() => {
            const total = countDays(params.fromDate, params.toDate);
            const size = Math.max(
              0,
              Math.min(page.pageSize, total - page.offset),
            );
            // makeBy always yields at least one element
            const content: ReadonlyArray<RewardFlight> =
              size > 0
                ? Array.makeBy(size, (i) => {
                    const day = addDays(params.fromDate, page.offset + i);
                    return flight(
                      `fixture-${params.origin}-${params.destination}-${day}`,
                      params.origin,
                      params.destination,
                      day,
                      params.carrierCode,
                      { economy: 10000, premiumEconomy: 20000, business: 30000 },
                    );
                  })
                : [];
            return paginate(content, total, page);
          }),

        cheapestSearch: (params, page) =>
          Effect.sync(() =>
            paginateAll(
              Array.sort(
                Array.makeBy(CHEAPEST_FLIGHT_COUNT, (i) =>
                  flight(
                    `fixture-${params.origin}-${params.destination}-${i}`,
                    params.origin,
                    params.destination,
                    addDays(options.anchorDate, i),
                    options.carrierCode,
                    {
                      economy: 10000 + i * 1000,
                      premiumEconomy: 20000 + i * 1500,
                      business: 30000 + i * 2000,
                    },
                  ),
                ),
                byCheapest(params.cabinClass),
              ),
              page,
            ),
          ),
      } satisfies RewardFlightQueriesPort),
    );
  };

  /**
   * Live Layer — configured from SearchConfig.
   */
  static readonly Live = Layer.unwrapEffect(
    Effect.gen(function* () {
      const config = yield* SearchConfig;
      return FixtureRewardFlightQueries.layer({
        anchorDate: config.fixtureAnchorDate,
        carrierCode: config.carrierCode,
      });
    }),
  );
}
