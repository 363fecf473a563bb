/** First line of a value, shortened to `max` characters. */
export function firstLine(text: string, max = 80): string {
  const line = text.split('\n', 1)[0];
  return line.length > max ? `${line.slice(0, max - 3)}...` : line;
}
