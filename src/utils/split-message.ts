/**
 * Split a reply into pieces no longer than `maxLength` characters, for
 * platforms that cap message size. Empty replies become a placeholder, since
 * most platforms reject empty messages.
 */
export function splitMessage(text: string, maxLength: number): string[] {
  if (!text.trim()) {
    return ['(No response)'];
  }
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += maxLength) {
    chunks.push(text.slice(i, i + maxLength));
  }
  return chunks;
}
