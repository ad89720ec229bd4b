import { HttpApiBuilder } from "@effect/platform";
import { PageRequest } from "@reward-search/application/models/page";
import { RewardFlightQueries } from "@reward-search/application/reward-flight-queries";
import { SearchConfig } from "@reward-search/config";
import { Effect } from "effect";
import { Api } from "../api.js";

interface PageParams {
  readonly "page-number"?: number | undefined;
  readonly "page-size"?: number | undefined;
}

const pageRequest = (params: PageParams, defaultPageSize: number) =>
  new PageRequest({
    pageNumber: params["page-number"] ?? 0,
    pageSize: params["page-size"] ?? defaultPageSize,
  });

export const RewardFlightsApiLive = HttpApiBuilder.group(
  Api,
  "rewardFlights",
  (handlers) =>
    Effect.gen(function* () {
      const queries = yield* RewardFlightQueries;
      const config = yield* SearchConfig;

      return handlers
        .handle("rangeSearch", ({ path, urlParams }) =>
          queries.rangeSearch(
            {
              origin: path.origin,
              destination: path.destination,
              carrierCode: config.carrierCode,
              fromDate: path.from,
              toDate: path.to,
            },
            pageRequest(urlParams, config.rangePageSize),
          ),
        )
        .handle("cheapestSearch", ({ path, urlParams }) =>
          queries.cheapestSearch(
            {
              origin: path.origin,
              destination: path.destination,
              cabinClass: path.cabinType,
            },
            pageRequest(urlParams, config.cheapestPageSize),
          ),
        );
    }),
);
