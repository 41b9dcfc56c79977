export function normalizeText(str: string): string {
  return str
    .replace(/\u00A0/g, ' ')
    .replace(/\u200B/g, '')
    .replace(/\s+/g, ' ')
    .normalize('NFC')
    .trim()
}

/** Code-unit ordering, independent of the host locale. */
export const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)
