const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

function fromText(value: unknown, pattern: RegExp): unknown {
  if (typeof value !== 'string') return value;
  const text = value.trim();
  return pattern.test(text) ? Number(text) : NaN;
}

/**
 * Query-string preprocessors for zod. Plain decimal text becomes a number;
 * blank, hex and other non-decimal text becomes NaN so the number schema
 * rejects it. Non-strings pass through untouched.
 */
export function decimalText(value: unknown): unknown {
  return fromText(value, DECIMAL);
}

export function integerText(value: unknown): unknown {
  return fromText(value, INTEGER);
}
