export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

export function snippet(text: string, maxChars: number): string {
  const flattened = text.replace(/\s+/g, " ").trim();
  if (flattened.length <= maxChars) {
    return flattened;
  }
  return `${flattened.slice(0, Math.max(0, maxChars - 3))}...`;
}

export function normalizeSourceName(source: string, index: number): string {
  const trimmed = source.trim();
  if (!trimmed) {
    return `uploaded-${index + 1}.txt`;
  }
  return trimmed.replace(/[\\/:*?"<>|]/g, "_");
}
