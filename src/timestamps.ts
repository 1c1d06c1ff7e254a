/**
 * local-time formatting for entry ids and daily log names.
 *
 * ids embed the wall-clock minute of creation: YYYY-MM-DD-HH-MM.
 * all fields zero-padded so ids and dates sort as plain text.
 */

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYY-MM-DD in local time. */
export function formatDate(time: Date): string {
  return `${time.getFullYear()}-${pad2(time.getMonth() + 1)}-${pad2(time.getDate())}`;
}

/** HH:MM in local time, seconds discarded. */
export function formatClock(time: Date): string {
  return `${pad2(time.getHours())}:${pad2(time.getMinutes())}`;
}

export function formatBaseId(time: Date): string {
  return `${formatDate(time)}-${formatClock(time).replace(":", "-")}`;
}

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function isValidDate(date: string): boolean {
  return DATE_PATTERN.test(date);
}
