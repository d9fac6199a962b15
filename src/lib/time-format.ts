function pad(value: number, width = 2): string {
  return value.toString().padStart(width, '0');
}

/**
 * Local-time row timestamp, `YYYY-MM-DD HH:MM:SS.mmm`
 */
export function formatRowTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Local-time file stamp, `YYYYMMDD_HHMMSS`
 */
export function formatFileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}
