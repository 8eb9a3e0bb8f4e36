function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`, the format stored for posts and comments.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
