/** Accepts finite numbers and numeric strings, as cache backends store counters either way. */
export function toCounter(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isValidAdjustment(offset: number, initial: number): boolean {
  return Number.isInteger(offset) && offset > 0 && Number.isInteger(initial) && initial >= 0;
}
