import { HttpApiEndpoint, HttpApiGroup } from "@effect/platform";
import { PageSchema } from "@reward-search/application/models/page";
import { RewardFlight } from "@reward-search/application/models/read-models";
import { RewardFlightSearchError } from "@reward-search/domain/errors";
import {
  AirportCodeFromString,
  CheapestCabinClassSchema,
  IsoDateSchema,
} from "@reward-search/domain/kernel";
import { Schema } from "effect";

export const RewardFlightPage = PageSchema(RewardFlight);

/**
 * Both parameters are optional; the endpoint picks the default page size.
 */
const PageParams = Schema.Struct({
  "page-number": Schema.optional(
    Schema.NumberFromString.pipe(Schema.int(), Schema.nonNegative()),
  ),
  "page-size": Schema.optional(
    Schema.NumberFromString.pipe(Schema.int(), Schema.positive()),
  ),
});

export class RewardFlightsGroup extends HttpApiGroup.make("rewardFlights")
  .add(
    HttpApiEndpoint.get(
      "rangeSearch",
      "/origin/:origin/destination/:destination/from/:from/to/:to",
    )
      .setPath(
        Schema.Struct({
          origin: AirportCodeFromString,
          destination: AirportCodeFromString,
          from: IsoDateSchema,
          to: IsoDateSchema,
        }),
      )
      .setUrlParams(PageParams)
      .addSuccess(RewardFlightPage)
      .addError(RewardFlightSearchError, { status: 500 }),
  )
  .add(
    HttpApiEndpoint.get(
      "cheapestSearch",
      "/origin/:origin/destination/:destination/cabin/:cabinType/cheapest",
    )
      .setPath(
        Schema.Struct({
          origin: AirportCodeFromString,
          destination: AirportCodeFromString,
          cabinType: CheapestCabinClassSchema,
        }),
      )
      .setUrlParams(PageParams)
      .addSuccess(RewardFlightPage)
      .addError(RewardFlightSearchError, { status: 500 }),
  )
  .prefix("/api/v1/airline/vs/reward-flights") {}
