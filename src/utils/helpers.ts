export const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Keep only the digits of a user-supplied identifier; empty input gives null. */
export function digitsOnly(value: string | null | undefined): string | null {
  const digits = (value || '').replace(/\D/g, '');
  return digits.length > 0 ? digits : null;
}
