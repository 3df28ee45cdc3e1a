export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

// Code points, not UTF-16 units, so surrogate pairs count once.
export function characterLength(text: string): number {
  return [...text].length;
}
