export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

export function isValidPriority(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_PRIORITY && value <= MAX_PRIORITY;
}
