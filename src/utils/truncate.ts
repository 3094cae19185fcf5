/**
 * First `limit` characters of `text`, counted by code point so astral
 * characters (emoji and the like) are never split.
 */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return Array.from(text).slice(0, limit).join('');
}
