import { Data } from "effect";

export type SearchKind = "range" | "cheapest";
export type SearchStep = "count" | "page" | "transaction";

// Persistence errors
export class DataAccessError extends Data.TaggedError("DataAccessError")<{
  readonly search: SearchKind;
  readonly step: SearchStep;
  readonly message: string;
  readonly cause?: unknown;
  readonly timestamp: Date;
}> {}

// Mapping errors
export class RowMappingError extends Data.TaggedError("RowMappingError")<{
  readonly column: string;
  readonly flightId?: string;
  readonly message: string;
  readonly timestamp: Date;
}> {}
