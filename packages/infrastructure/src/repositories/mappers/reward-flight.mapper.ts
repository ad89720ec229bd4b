import {
  AwardOffer,
  PointsValue,
  RewardFlight,
  SeatCount,
} from "@reward-search/application/models/read-models";
import { IsoDateSchema } from "@reward-search/domain/kernel";
import { Either, Option, ParseResult, Schema } from "effect";
import { type AwardTable, AwardTables } from "../../db/schema.js";
import { RowMappingError } from "../../errors.js";

// --- Database Row Types ---

/**
 * One joined search row: the flight columns plus `<alias>_id`,
 * `<alias>_cabin_points_value`, `<alias>_is_saver_award`,
 * `<alias>_cabin_class_seat_count` and `<alias>_cabin_class_seat_count_string`
 * for every award table. Value types depend on the driver.
 */
export type RewardFlightRow = Readonly<Record<string, unknown>>;

// --- Column Schemas ---

// Integer keys from SQLite and Postgres, bigint or text keys elsewhere
const IdColumn = Schema.transform(
  Schema.Union(Schema.String, Schema.Int, Schema.BigIntFromSelf),
  Schema.String,
  {
    strict: true,
    decode: (id) => String(id),
    encode: (id) => id,
  },
);

// Accepts DATE text as well as timestamp text
const DepartureColumn = Schema.transform(Schema.String, IsoDateSchema, {
  strict: true,
  decode: (value) => value.slice(0, 10),
  encode: (date) => date,
});

const TimestampColumn = Schema.Union(Schema.ValidDateFromSelf, Schema.Date);

// Postgres booleans, SQLite 0/1
const SaverFlagColumn = Schema.Union(
  Schema.Boolean,
  Schema.transform(Schema.Literal(0, 1), Schema.Boolean, {
    strict: true,
    decode: (flag) => flag === 1,
    encode: (saver) => (saver ? 1 : 0),
  }),
);

// --- Mappers ---

const readColumn = <A, I>(
  schema: Schema.Schema<A, I>,
  row: RewardFlightRow,
  column: string,
  flightId?: string,
): Either.Either<A, RowMappingError> =>
  Schema.decodeUnknownEither(schema)(row[column]).pipe(
    Either.mapLeft(
      (error) =>
        new RowMappingError({
          column,
          flightId,
          message: ParseResult.TreeFormatter.formatErrorSync(error),
          timestamp: new Date(),
        }),
    ),
  );

// A null or mismatched attribute only empties that attribute
const readAttribute = <A, I>(
  schema: Schema.Schema<A, I>,
  row: RewardFlightRow,
  column: string,
): Option.Option<A> => Schema.decodeUnknownOption(schema)(row[column]);

/**
 * Builds a cabin's offer when its identifier column is set.
 * Attribute columns alone never produce an offer.
 */
export const toAwardOffer = (
  row: RewardFlightRow,
  { alias }: AwardTable,
  flightId?: string,
): Either.Either<Option.Option<AwardOffer>, RowMappingError> => {
  const idColumn = `${alias}_id`;
  const rawId = row[idColumn];
  if (rawId === null || rawId === undefined) {
    return Either.right(Option.none());
  }

  return readColumn(IdColumn, row, idColumn, flightId).pipe(
    Either.map((id) =>
      Option.some(
        new AwardOffer({
          id,
          cabinPointsValue: readAttribute(
            PointsValue,
            row,
            `${alias}_cabin_points_value`,
          ),
          isSaverAward: readAttribute(
            SaverFlagColumn,
            row,
            `${alias}_is_saver_award`,
          ),
          cabinClassSeatCount: readAttribute(
            SeatCount,
            row,
            `${alias}_cabin_class_seat_count`,
          ),
          cabinClassSeatCountString: readAttribute(
            Schema.String,
            row,
            `${alias}_cabin_class_seat_count_string`,
          ),
        }),
      ),
    ),
  );
};

export const toRewardFlight = (
  row: RewardFlightRow,
): Either.Either<RewardFlight, RowMappingError> =>
  Either.gen(function* () {
    const id = yield* readColumn(IdColumn, row, "id");

    return new RewardFlight({
      id,
      origin: yield* readColumn(Schema.String, row, "origin", id),
      destination: yield* readColumn(Schema.String, row, "destination", id),
      departure: yield* readColumn(DepartureColumn, row, "departure", id),
      carrierCode: yield* readColumn(Schema.String, row, "carrier_code", id),
      scrapedAt: yield* readColumn(TimestampColumn, row, "scraped_at", id),
      awardEconomy: yield* toAwardOffer(row, AwardTables.economy, id),
      awardPremiumEconomy: yield* toAwardOffer(
        row,
        AwardTables.premiumEconomy,
        id,
      ),
      awardBusiness: yield* toAwardOffer(row, AwardTables.business, id),
      awardFirst: yield* toAwardOffer(row, AwardTables.first, id),
    });
  });
