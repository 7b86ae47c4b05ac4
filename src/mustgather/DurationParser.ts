const UNIT_SECONDS: Record<string, number> = {
  h: 3600,
  m: 60,
  s: 1,
};

const TERM_PATTERN = /(\d+(?:\.\d*)?|\.\d+)([hms])/y;

// Largest duration a signed 64-bit nanosecond count can hold
export const MAX_DURATION_SECONDS = 9_223_372_036.854775807;

/**
 * Parse a relative duration such as `30s`, `6m20s`, `2h10m30s` or `1.5h`.
 *
 * Terms may repeat in any order and are summed. The bare string `0` is accepted.
 * Only `h`, `m` and `s` units are recognized: `500ms`, `10us` and signed values such as
 * `-5s` are not durations here.
 * Returns the total in seconds, or `undefined` when the text is not a duration or exceeds
 * {@link MAX_DURATION_SECONDS}.
 */
export function parseDuration(text: string): number | undefined {
  if (text === '0') {
    return 0;
  }
  if (text.length === 0) {
    return undefined;
  }

  let total = 0;
  TERM_PATTERN.lastIndex = 0;
  while (TERM_PATTERN.lastIndex < text.length) {
    const match = TERM_PATTERN.exec(text);
    if (!match) {
      return undefined;
    }
    total += parseFloat(match[1]) * UNIT_SECONDS[match[2]];
  }

  return total <= MAX_DURATION_SECONDS ? total : undefined;
}

export function isValidDuration(text: string): boolean {
  return parseDuration(text) !== undefined;
}

/**
 * Render seconds the way GNU timeout takes them, e.g. `600s` or `1.5s`.
 * A positive value never renders as `0s`, which timeout reads as no limit.
 */
export function formatSeconds(seconds: number): string {
  const rounded = Math.round(seconds * 1000) / 1000;
  return `${seconds > 0 && rounded === 0 ? 0.001 : rounded}s`;
}
