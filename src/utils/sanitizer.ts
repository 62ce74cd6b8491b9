export function sanitizeText(text: string | null | undefined): string {
  if (text == null) return '';
  return text.replace(/\s+/g, ' ').trim();
}

export function clampText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength).trimEnd();
}

export function dedupePreservingOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
