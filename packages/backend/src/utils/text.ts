export function countWords(input: string): number {
  const normalized = input.trim();
  if (normalized.length === 0) {
    return 0;
  }

  return normalized.split(/\s+/).length;
}

export function countLines(input: string): number {
  return input.length > 0 ? input.split(/\r?\n/).length : 0;
}

export function previewText(input: string, maxLength = 100): string {
  if (input.length <= maxLength) {
    return input;
  }
  return `${input.slice(0, maxLength)}...`;
}

export function normalizeWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
