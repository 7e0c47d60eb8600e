/** `2026-01-15T08:30:00.000Z` → `2026-01-15 08:30`. */
export function formatUtcMinutes(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 16).replace('T', ' ');
}
