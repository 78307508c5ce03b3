function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
