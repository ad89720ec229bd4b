import { PageRequest } from "@reward-search/application/models/page";
import { RewardFlightQueries } from "@reward-search/application/reward-flight-queries";
import {
  type CheapestCabinClass,
  makeAirportCode,
  makeCarrierCode,
  makeIsoDate,
} from "@reward-search/domain/kernel";
import { Effect, Option } from "effect";
import { describe, expect, it } from "vitest";
import { FixtureRewardFlightQueries } from "./fixture-reward-flight-queries.js";

describe("FixtureRewardFlightQueries", () => {
  const FixtureLayer = FixtureRewardFlightQueries.layer({
    anchorDate: makeIsoDate("2025-01-01"),
    carrierCode: makeCarrierCode("VS"),
  });

  const LHR = makeAirportCode("LHR");
  const JFK = makeAirportCode("JFK");

  const rangeSearch = (from: string, to: string, page: PageRequest) =>
    Effect.gen(function* () {
      const queries = yield* RewardFlightQueries;
      return yield* queries.rangeSearch(
        {
          origin: LHR,
          destination: JFK,
          carrierCode: makeCarrierCode("VS"),
          fromDate: makeIsoDate(from),
          toDate: makeIsoDate(to),
        },
        page,
      );
    }).pipe(Effect.provide(FixtureLayer), Effect.runSync);

  const cheapestSearch = (cabinClass: CheapestCabinClass, page: PageRequest) =>
    Effect.gen(function* () {
      const queries = yield* RewardFlightQueries;
      return yield* queries.cheapestSearch(
        { origin: LHR, destination: JFK, cabinClass },
        page,
      );
    }).pipe(Effect.provide(FixtureLayer), Effect.runSync);

  const points = (option: Option.Option<{ readonly cabinPointsValue: Option.Option<number> }>) =>
    Option.getOrNull(Option.flatMap(option, (award) => award.cabinPointsValue));

  describe("rangeSearch", () => {
    it("should return one flight per day of the range", () => {
      const page = rangeSearch(
        "2024-06-01",
        "2024-06-03",
        new PageRequest({ pageNumber: 0, pageSize: 10 }),
      );

      expect(page.content.map((flight) => flight.id)).toEqual([
        "fixture-LHR-JFK-2024-06-01",
        "fixture-LHR-JFK-2024-06-02",
        "fixture-LHR-JFK-2024-06-03",
      ]);
      expect(page.totalElements).toBe(3);
      expect(page.totalPages).toBe(1);
    });

    it("should offer every cabin except first", () => {
      const page = rangeSearch(
        "2024-06-01",
        "2024-06-01",
        new PageRequest({ pageNumber: 0, pageSize: 10 }),
      );
      const [flight] = page.content;
      expect(flight).toBeDefined();
      if (!flight) return;

      expect(points(flight.awardEconomy)).toBe(10000);
      expect(points(flight.awardPremiumEconomy)).toBe(20000);
      expect(points(flight.awardBusiness)).toBe(30000);
      expect(Option.isNone(flight.awardFirst)).toBe(true);
      expect(flight.scrapedAt.toISOString()).toBe("2025-01-01T06:00:00.000Z");
    });

    it("should page through the days", () => {
      const page = rangeSearch(
        "2024-06-01",
        "2024-06-10",
        new PageRequest({ pageNumber: 2, pageSize: 4 }),
      );

      expect(page.content.map((flight) => flight.departure)).toEqual([
        "2024-06-09",
        "2024-06-10",
      ]);
      expect(page.totalElements).toBe(10);
      expect(page.totalPages).toBe(3);
    });

    it("should return nothing for a reversed range", () => {
      const page = rangeSearch(
        "2024-06-03",
        "2024-06-01",
        new PageRequest({ pageNumber: 0, pageSize: 10 }),
      );

      expect(page.content).toEqual([]);
      expect(page.totalElements).toBe(0);
      expect(page.totalPages).toBe(0);
    });

    it("should end the range on the last representable date", () => {
      const page = rangeSearch(
        "9999-12-30",
        "9999-12-31",
        new PageRequest({ pageNumber: 0, pageSize: 10 }),
      );

      expect(page.content.map((flight) => flight.departure)).toEqual([
        "9999-12-30",
        "9999-12-31",
      ]);
      expect(page.totalElements).toBe(2);
    });

    it("should build only the requested page of a very long range", () => {
      const page = rangeSearch(
        "0001-01-01",
        "9999-12-31",
        new PageRequest({ pageNumber: 0, pageSize: 2 }),
      );

      expect(page.content.map((flight) => flight.departure)).toEqual([
        "0001-01-01",
        "0001-01-02",
      ]);
      expect(page.totalElements).toBe(3652059);
      expect(page.totalPages).toBe(1826030);
    });

    it("should answer an empty page past the end with the true totals", () => {
      const page = rangeSearch(
        "2024-06-01",
        "2024-06-03",
        new PageRequest({ pageNumber: 2 ** 52, pageSize: 10000 }),
      );

      expect(page.content).toEqual([]);
      expect(page.totalElements).toBe(3);
      expect(page.totalPages).toBe(1);
    });
  });

  describe("cheapestSearch", () => {
    it("should rank ten flights by the selected cabin", () => {
      const page = cheapestSearch(
        "BUSINESS",
        new PageRequest({ pageNumber: 0, pageSize: 50 }),
      );

      expect(page.totalElements).toBe(10);
      expect(page.content.map((flight) => points(flight.awardBusiness))).toEqual([
        30000, 32000, 34000, 36000, 38000, 40000, 42000, 44000, 46000, 48000,
      ]);
      expect(page.content[0]?.departure).toBe("2025-01-01");
      expect(page.content[9]?.departure).toBe("2025-01-10");
      expect(page.content[0]?.carrierCode).toBe("VS");
    });

    it("should return the second page of premium economy offers", () => {
      const page = cheapestSearch(
        "PREMIUM_ECONOMY",
        new PageRequest({ pageNumber: 1, pageSize: 3 }),
      );

      expect(
        page.content.map((flight) => points(flight.awardPremiumEconomy)),
      ).toEqual([24500, 26000, 27500]);
      expect(page.totalPages).toBe(4);
    });

    it("should answer identical pages on repeated calls", () => {
      const request = new PageRequest({ pageNumber: 0, pageSize: 5 });

      expect(cheapestSearch("ECONOMY", request)).toEqual(
        cheapestSearch("ECONOMY", request),
      );
    });
  });
});
