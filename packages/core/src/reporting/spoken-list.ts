/**
 * Render numbers as an English list: "5", "5 and 6", "5, 6, and 7".
 */
export function spokenList(items: ReadonlyArray<number>): string {
  const words = items.map(String);
  if (words.length <= 2) return words.join(' and ');
  return `${words.slice(0, -1).join(', ')}, and ${words.at(-1) ?? ''}`;
}
