/** Value of an HTTP header, matched without regard to the name's case. */
export function readHeader(
  headers: Readonly<Record<string, string>>,
  name: string
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
