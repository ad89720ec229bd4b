/**
 * @file kernel.ts
 * @module @reward-search/domain/kernel
 * @description Shared kernel of the reward search context.
 *
 * Value objects used on both sides of the search: airport and carrier codes,
 * calendar dates, and the cabin classes an award can be offered in.
 */

import { Schema } from "effect";

// =============================================================================
// PRIMITIVE VALUE OBJECTS
// =============================================================================

// --- Airport Code (IATA) ---
export const AirportCodeSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Z]{3}$/),
  Schema.brand("AirportCode"),
);
export type AirportCode = typeof AirportCodeSchema.Type;

/**
 * Accepts codes in any letter case ("lhr", "Lhr") and normalizes them.
 */
export const AirportCodeFromString = Schema.transform(
  Schema.String,
  AirportCodeSchema,
  {
    strict: true,
    decode: (code) => code.trim().toUpperCase(),
    encode: (code) => code,
  },
);

export const makeAirportCode = (code: string): AirportCode =>
  AirportCodeSchema.make(code);

// --- Carrier Code (IATA, two characters) ---
export const CarrierCodeSchema = Schema.String.pipe(
  Schema.pattern(/^[A-Z0-9]{2}$/),
  Schema.brand("CarrierCode"),
);
export type CarrierCode = typeof CarrierCodeSchema.Type;

export const makeCarrierCode = (code: string): CarrierCode =>
  CarrierCodeSchema.make(code);

// --- Calendar Date (YYYY-MM-DD, no time component) ---
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const isCalendarDate = (value: string): boolean => {
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return (
    !Number.isNaN(parsed.getTime()) &&
    parsed.toISOString().slice(0, 10) === value
  );
};

export const IsoDateSchema = Schema.String.pipe(
  Schema.pattern(ISO_DATE_PATTERN, {
    message: () => "Expected a date formatted as YYYY-MM-DD",
  }),
  Schema.filter(isCalendarDate, {
    message: () => "Expected an existing calendar date",
  }),
  Schema.brand("IsoDate"),
);
export type IsoDate = typeof IsoDateSchema.Type;

export const makeIsoDate = (value: string): IsoDate =>
  IsoDateSchema.make(value);

const DAY_MS = 24 * 60 * 60 * 1000;

export const addDays = (date: IsoDate, days: number): IsoDate => {
  const start = new Date(`${date}T00:00:00.000Z`).getTime();
  return makeIsoDate(new Date(start + days * DAY_MS).toISOString().slice(0, 10));
};

const toEpochDay = (date: IsoDate): number =>
  new Date(`${date}T00:00:00.000Z`).getTime() / DAY_MS;

/**
 * Number of days in the inclusive range. Zero when `from` is after `to`.
 */
export const countDays = (from: IsoDate, to: IsoDate): number =>
  Math.max(0, toEpochDay(to) - toEpochDay(from) + 1);

/**
 * Every calendar day of the inclusive range. Empty when `from` is after `to`.
 * Never steps past `to`.
 */
export const eachDay = (from: IsoDate, to: IsoDate): ReadonlyArray<IsoDate> =>
  Array.from({ length: countDays(from, to) }, (_, i) => addDays(from, i));

// =============================================================================
// DOMAIN ENUMS
// =============================================================================

// --- Cabin Class ---
export const CabinClass = {
  ECONOMY: "ECONOMY",
  PREMIUM_ECONOMY: "PREMIUM_ECONOMY",
  BUSINESS: "BUSINESS",
  FIRST: "FIRST",
} as const;

export type CabinClass = (typeof CabinClass)[keyof typeof CabinClass];

/**
 * Cabins that support a cheapest-first search.
 * First class is not ranked by points.
 */
export const CheapestCabinClassSchema = Schema.Literal(
  CabinClass.ECONOMY,
  CabinClass.PREMIUM_ECONOMY,
  CabinClass.BUSINESS,
);
export type CheapestCabinClass = typeof CheapestCabinClassSchema.Type;
