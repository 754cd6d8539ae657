/** Recoverable caller error: the request was out of range for the node it targets. */
export type InvalidArgumentFatal = Readonly<{ code: "LAYOUT_INVALID_ARGUMENT"; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Callers may clamp and retry, or ignore the request.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidArgumentFatal }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function invalidArgument(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "LAYOUT_INVALID_ARGUMENT", detail } };
}

/** Check `index` against `length`, producing a ready-made failure when it is out of range. */
export function checkIndex(
  what: string,
  index: number,
  length: number,
): LayoutResult<number> {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    return invalidArgument(`${what}: index ${String(index)} out of range [0, ${String(length)})`);
  }
  return ok(index);
}
