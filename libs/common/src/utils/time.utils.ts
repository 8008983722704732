/** Current time as whole epoch seconds. */
export function epochSeconds(date: Date = new Date()): number {
  return Math.round(date.getTime() / 1000);
}
