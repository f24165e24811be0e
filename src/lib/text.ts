// ============================================
// Text helpers: lengths and slices in code points,
// so a surrogate pair (most emoji) is never split
// ============================================

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/** First `count` code points of the text. */
export function sliceCodePoints(text: string, count: number): string {
  return Array.from(text).slice(0, Math.max(0, count)).join("");
}
