const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/i;

interface ZonedParts {
  year: string;
  month: string;
  day: string;
  hour: number;
  minute: string;
  second: string;
  zoneName: string;
}

const partsFormatters = new Map<string, Intl.DateTimeFormat>();

function getPartsFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = partsFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    });
    partsFormatters.set(timeZone, formatter);
  }
  return formatter;
}

function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = getPartsFormatter(timeZone).formatToParts(date);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '';

  return {
    year: pick('year'),
    month: pick('month'),
    day: pick('day'),
    hour: Number(pick('hour')) % 24,
    minute: pick('minute'),
    second: pick('second'),
    zoneName: pick('timeZoneName'),
  };
}

/**
 * IANA タイムゾーン名として解釈できるか
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Discord の ISO-8601 タイムスタンプを解釈する
 * マイクロ秒まで含む形式（例: 2024-01-15T10:30:00.000000+00:00）にも対応し、解釈できなければ null
 */
export function parseIsoTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction = '', offset] = match;
  const fields = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = fields;
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59 || s > 59) return null;

  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));
  let offsetMinutes = 0;
  if (offset.toUpperCase() !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    offsetMinutes = sign * (Number(offset.slice(1, 3)) * 60 + Number(offset.slice(4, 6)));
  }

  const utc = Date.UTC(y, mo - 1, d, h, mi, s, millis) - offsetMinutes * 60_000;
  const date = new Date(utc);
  // 2月30日のような存在しない日付を弾く
  if (new Date(Date.UTC(y, mo - 1, d)).getUTCDate() !== d) return null;
  return date;
}

/**
 * 表示用の日時文字列（YYYY-MM-DD hh:mm:ss AM/PM TZ）を生成する
 */
export function formatDisplayTime(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  const hour12 = p.hour % 12 === 0 ? 12 : p.hour % 12;
  const period = p.hour < 12 ? 'AM' : 'PM';
  const hh = String(hour12).padStart(2, '0');
  return `${p.year}-${p.month}-${p.day} ${hh}:${p.minute}:${p.second} ${period} ${p.zoneName}`;
}

/**
 * ファイル名に使える日付・時刻（YYYY-MM-DD / HH-MM-SS）を生成する
 */
export function formatFileStamp(date: Date, timeZone: string): { date: string; time: string } {
  const p = getZonedParts(date, timeZone);
  const hh = String(p.hour).padStart(2, '0');
  return { date: `${p.year}-${p.month}-${p.day}`, time: `${hh}-${p.minute}-${p.second}` };
}

/**
 * タイムゾーンのオフセット付き ISO-8601 文字列（例: 2024-01-15T10:00:00-05:00）
 */
export function toZonedIsoString(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  const hh = String(p.hour).padStart(2, '0');
  const wallClock = Date.UTC(
    Number(p.year),
    Number(p.month) - 1,
    Number(p.day),
    p.hour,
    Number(p.minute),
    Number(p.second)
  );
  const offsetMinutes = Math.round((wallClock - Math.floor(date.getTime() / 1000) * 1000) / 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  const offset = `${sign}${String(Math.floor(abs / 60)).padStart(2, '0')}:${String(abs % 60).padStart(2, '0')}`;
  return `${p.year}-${p.month}-${p.day}T${hh}:${p.minute}:${p.second}${offset}`;
}
