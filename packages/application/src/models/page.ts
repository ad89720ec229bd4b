/**
 * @file page.ts
 * @module @reward-search/application/models
 * @description Page requests, the page envelope and the paginator.
 */

import { Schema } from "effect";

const NonNegativeInt = Schema.Number.pipe(Schema.int(), Schema.nonNegative());

// --- Page Request ---

/**
 * Zero-based page number and a page size of at least one.
 * Construction fails for anything else, so the paginator never divides by zero.
 */
export class PageRequest extends Schema.Class<PageRequest>("PageRequest")({
  pageNumber: NonNegativeInt,
  pageSize: Schema.Number.pipe(Schema.int(), Schema.positive()),
}) {
  get offset(): number {
    return this.pageNumber * this.pageSize;
  }
}

// --- Page Envelope ---

export interface Page<A> {
  readonly content: ReadonlyArray<A>;
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly totalElements: number;
  readonly totalPages: number;
}

/**
 * Wire schema of a page of `item`.
 */
export const PageSchema = <A, I, R>(item: Schema.Schema<A, I, R>) =>
  Schema.Struct({
    content: Schema.Array(item),
    pageNumber: Schema.propertySignature(NonNegativeInt).pipe(
      Schema.fromKey("page_number"),
    ),
    pageSize: Schema.propertySignature(NonNegativeInt).pipe(
      Schema.fromKey("page_size"),
    ),
    totalElements: Schema.propertySignature(NonNegativeInt).pipe(
      Schema.fromKey("total_elements"),
    ),
    totalPages: Schema.propertySignature(NonNegativeInt).pipe(
      Schema.fromKey("total_pages"),
    ),
  });

// --- Paginator ---

export const totalPagesFor = (totalElements: number, pageSize: number): number =>
  Math.ceil(totalElements / pageSize);

/**
 * Wraps one already-limited page of results. The page number is not clamped:
 * a page past the end carries empty content and the true totals.
 */
export const paginate = <A>(
  content: ReadonlyArray<A>,
  totalElements: number,
  request: PageRequest,
): Page<A> => ({
  content,
  pageNumber: request.pageNumber,
  pageSize: request.pageSize,
  totalElements,
  totalPages: totalPagesFor(totalElements, request.pageSize),
});

/**
 * Slices the requested page out of a complete, ordered result set.
 */
export const paginateAll = <A>(
  items: ReadonlyArray<A>,
  request: PageRequest,
): Page<A> =>
  paginate(
    items.slice(request.offset, request.offset + request.pageSize),
    items.length,
    request,
  );
