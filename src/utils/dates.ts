/**
 * Timestamp helpers for API timestamps and post dates
 *
 * The Threads API returns `2024-05-01T12:00:00+0000` (offset without colon).
 * Post dates are stored in the configured zone as `2024-05-01T20:00:00+0800`.
 */

const COMPACT_OFFSET = /([+-])(\d{2})(\d{2})$/

/**
 * Parse an ISO 8601 timestamp, accepting `+HHMM` offsets
 *
 * @returns Date, or null if the value is not a timestamp
 */
export function parseTimestamp(value: string | undefined | null): Date | null {
  if (!value || value.trim() === '') return null
  const trimmed = value.trim()
  const normalized = /T\d{2}:\d{2}/.test(trimmed)
    ? trimmed.replace(COMPACT_OFFSET, '$1$2:$3')
    : trimmed
  const ms = Date.parse(normalized)
  return Number.isNaN(ms) ? null : new Date(ms)
}

type ZonedParts = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

const formatterCache = new Map<string, Intl.DateTimeFormat>()

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    })
    formatterCache.set(timeZone, formatter)
  }
  return formatter
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  const values = new Map<string, number>()
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') values.set(part.type, Number(part.value))
  }
  const get = (type: string): number => values.get(type) ?? 0
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour') % 24,
    minute: get('minute'),
    second: get('second'),
  }
}

const pad = (n: number, width = 2): string => String(n).padStart(width, '0')

/**
 * Offset of the zone from UTC at the given instant, in minutes
 */
export function timeZoneOffsetMinutes(date: Date, timeZone: string): number {
  const p = zonedParts(date, timeZone)
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second)
  const wholeSeconds = date.getTime() - date.getUTCMilliseconds()
  return Math.round((asUtc - wholeSeconds) / 60_000)
}

/**
 * Format as `YYYY-MM-DDTHH:mm:ss±HHMM` in the given zone
 */
export function formatInTimeZone(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone)
  const offset = timeZoneOffsetMinutes(date, timeZone)
  const sign = offset < 0 ? '-' : '+'
  const abs = Math.abs(offset)
  return (
    `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}` +
    `T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}` +
    `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`
  )
}

/**
 * Calendar date (`YYYY-MM-DD`) of the instant in the given zone
 */
export function formatDateInTimeZone(date: Date, timeZone: string): string {
  const p = zonedParts(date, timeZone)
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`
}
