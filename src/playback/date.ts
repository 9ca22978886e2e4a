export const TODAY_SENTINEL = "today";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

// "Oct 05 2026"
export function formatShortDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${MONTHS[date.getMonth()]} ${day} ${date.getFullYear()}`;
}

/**
 * Display text for the document date. The model keeps the literal value;
 * the sentinel is only resolved when a page is shown.
 */
export function resolveDisplayDate(value: string, now: Date = new Date()): string {
  return value.trim() === TODAY_SENTINEL ? formatShortDate(now) : value;
}
