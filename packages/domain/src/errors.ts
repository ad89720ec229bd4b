import { Schema } from "effect";

// --- Search Errors ---

/**
 * A search that could not produce a page.
 * Distinct from a successful search with zero matches.
 */
export class RewardFlightSearchError extends Schema.TaggedError<RewardFlightSearchError>()(
  "RewardFlightSearchError",
  {
    reason: Schema.Literal("DataAccess", "Mapping"),
    message: Schema.String,
  },
) {}
