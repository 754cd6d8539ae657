/**
 * packages/core/src/layout/errors.ts — Thrown layout errors.
 *
 * Only misuse of the engine throws (re-entrant layout, unbalanced updates,
 * scrolling a released bar). Bad arguments come back as `LayoutResult`.
 */

export type LayoutErrorCode =
  | "LAYOUT_INVALID_STATE"
  | "LAYOUT_REENTRANT_CALL"
  | "LAYOUT_DESTROYED_SCROLLBAR";

export class LayoutError extends Error {
  override readonly name = "LayoutError";
  readonly code: LayoutErrorCode;
  /** What the caller did, without the code prefix. */
  readonly detail: string | null;

  constructor(code: LayoutErrorCode, detail?: string) {
    super(detail === undefined ? code : `${code}: ${detail}`);
    this.code = code;
    this.detail = detail ?? null;
    Error.captureStackTrace?.(this, LayoutError);
  }
}
