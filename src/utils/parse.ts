/** Numeric and wording helpers shared by the resort adapters. */

export function averageRange(low: string, high: string | undefined): number {
  const lowValue = parseFloat(low);
  if (!high) return lowValue;
  return (lowValue + parseFloat(high)) / 2;
}

/** Negative wording is checked first so "not operating" never reads as open. */
export function parseBoolStatus(text: string | null | undefined): boolean | null {
  if (!text) return null;
  const lower = text.trim().toLowerCase();
  if (['not operating', 'closed', 'not open'].some((phrase) => lower.includes(phrase))) {
    return false;
  }
  if (['open', 'yes', 'operating'].some((word) => lower.includes(word))) {
    return true;
  }
  return null;
}

export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/** First capture group of the first pattern that matches, as a number. */
export function firstNumber(text: string, ...patterns: RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match?.[1]) return parseFloat(match[1]);
  }
  return null;
}

/** First pattern whose two capture groups both matched, as an integer pair. */
export function firstPair(text: string, ...patterns: RegExp[]): [number, number] | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match?.[1] && match[2]) {
      return [parseInt(match[1], 10), parseInt(match[2], 10)];
    }
  }
  return null;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
