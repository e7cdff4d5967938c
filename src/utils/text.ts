export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 1)}…`;
}

export function excerpt(text: string, maxLength = 80): string {
  return truncate(collapseWhitespace(text), maxLength);
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Count desc, then term asc. The one ordering every ranked list uses. */
export function byCountThenTerm<T extends { count: number; term: string }>(a: T, b: T): number {
  return b.count - a.count || compareStrings(a.term, b.term);
}

/** Code-unit comparison; unlike localeCompare it does not vary by host locale. */
export function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
