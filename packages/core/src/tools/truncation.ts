function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Index where a tail of at most `keep` code units starts without splitting a surrogate pair. */
function tailStart(text: string, keep: number): number {
  const start = text.length - keep;
  return start > 0 && isLowSurrogate(text.charCodeAt(start)) ? start + 1 : start;
}

/**
 * Keeps the end of `text` within `maxChars`, prefixed by a marker naming how
 * many leading characters were dropped. The marker counts toward the limit.
 */
export function truncateTail(text: string, maxChars: number): string {
  const limit = Math.max(0, Math.floor(maxChars));
  if (text.length <= limit) {
    return text;
  }

  let dropped = text.length - limit;
  for (;;) {
    const marker = `[truncated ${dropped} chars]\n`;
    if (marker.length > limit) {
      return limit === 0 ? "" : text.slice(tailStart(text, limit));
    }
    const start = tailStart(text, limit - marker.length);
    if (start === dropped) {
      return marker + text.slice(start);
    }
    dropped = start;
  }
}
