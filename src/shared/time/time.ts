function pad(num: number): string {
  return num < 10 ? `0${num}` : `${num}`;
}

export function formatDateOnly(date: Date): string {
  const y = date.getFullYear();
  const m = pad(date.getMonth() + 1);
  const d = pad(date.getDate());
  return `${y}-${m}-${d}`;
}

/** YYYY-MM-DD HH:mm:ss，本地时区。 */
export function formatDateTime(date: Date | null | undefined): string {
  if (!date) return '';
  const hh = pad(date.getHours());
  const mm = pad(date.getMinutes());
  const ss = pad(date.getSeconds());
  return `${formatDateOnly(date)} ${hh}:${mm}:${ss}`;
}

/** YYYYMMDD，用于按天分桶的 Redis 键。 */
export function compactDate(date: Date): string {
  return formatDateOnly(date).replace(/-/g, '');
}

/**
 * 解析 "YYYY-MM-DD" 或 "YYYY-MM-DD HH:mm:ss"，非法时返回 null。
 */
export function parseDateTime(value: string | undefined): Date | null {
  if (!value) return null;
  const s = value.trim();
  if (!s) return null;
  const d = new Date(s.includes(' ') ? s.replace(' ', 'T') : `${s}T00:00:00`);
  if (Number.isNaN(d.getTime())) return null;
  return d;
}

/** 结束日期只给到天时，取当天 23:59:59。 */
export function parseEndDateTime(value: string | undefined): Date | null {
  const d = parseDateTime(value);
  if (d && value && !value.trim().includes(' ')) {
    d.setHours(23, 59, 59, 999);
  }
  return d;
}
