/**
 * @file read-models.ts
 * @module @reward-search/application/models
 * @description Read models returned by reward flight searches.
 *
 * Property names are camelCase in memory and snake_case on the wire.
 */

import { IsoDateSchema } from "@reward-search/domain/kernel";
import { Schema } from "effect";

// Stored integers are kept as they are, negatives included
export const PointsValue = Schema.Number.pipe(Schema.int());
export const SeatCount = Schema.Number.pipe(Schema.int());

// --- Award Offer ---

/**
 * One cabin's award availability for a flight.
 * Every attribute is optional on its own; the integer and string seat counts
 * are stored independently.
 */
export class AwardOffer extends Schema.Class<AwardOffer>("AwardOffer")({
  id: Schema.String,
  cabinPointsValue: Schema.propertySignature(
    Schema.OptionFromNullOr(PointsValue),
  ).pipe(Schema.fromKey("cabin_points_value")),
  isSaverAward: Schema.propertySignature(
    Schema.OptionFromNullOr(Schema.Boolean),
  ).pipe(Schema.fromKey("is_saver_award")),
  cabinClassSeatCount: Schema.propertySignature(
    Schema.OptionFromNullOr(SeatCount),
  ).pipe(Schema.fromKey("cabin_class_seat_count")),
  cabinClassSeatCountString: Schema.propertySignature(
    Schema.OptionFromNullOr(Schema.String),
  ).pipe(Schema.fromKey("cabin_class_seat_count_string")),
}) {}

// --- Reward Flight ---

const AwardSlot = Schema.OptionFromNullOr(AwardOffer);

/**
 * A scraped flight with up to four cabin offers.
 * A slot is `None` when the flight has no award row for that cabin.
 */
export class RewardFlight extends Schema.Class<RewardFlight>("RewardFlight")({
  id: Schema.String,
  origin: Schema.String,
  destination: Schema.String,
  departure: IsoDateSchema,
  carrierCode: Schema.propertySignature(Schema.String).pipe(
    Schema.fromKey("carrier_code"),
  ),
  scrapedAt: Schema.propertySignature(Schema.Date).pipe(
    Schema.fromKey("scraped_at"),
  ),
  awardEconomy: Schema.propertySignature(AwardSlot).pipe(
    Schema.fromKey("award_economy"),
  ),
  awardBusiness: Schema.propertySignature(AwardSlot).pipe(
    Schema.fromKey("award_business"),
  ),
  awardPremiumEconomy: Schema.propertySignature(AwardSlot).pipe(
    Schema.fromKey("award_premium_economy"),
  ),
  awardFirst: Schema.propertySignature(AwardSlot).pipe(
    Schema.fromKey("award_first"),
  ),
}) {}
