/** Largest id the `integer` key columns hold. */
export const MAX_ID = 2147483647;

export function isStorableId(id: number): boolean {
  return Number.isInteger(id) && id > 0 && id <= MAX_ID;
}

/** Parses a decimal id, or null when it is not one a row could carry. */
export function parseStorableId(raw: string): number | null {
  if (!/^[1-9]\d{0,9}$/.test(raw)) {
    return null;
  }
  const id = Number(raw);
  return isStorableId(id) ? id : null;
}
