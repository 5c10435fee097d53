/**
 * Timezone helpers built on Intl.DateTimeFormat.
 *
 * "Wall time" is the local clock reading in a zone expressed as epoch
 * milliseconds as if that reading were UTC.
 */

const formatters = new Map<string, Intl.DateTimeFormat>()

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone)
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    })
    formatters.set(timeZone, formatter)
  }
  return formatter
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone)
    return true
  } catch {
    return false
  }
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds.
 */
export function timeZoneOffsetMs(instant: Date, timeZone: string): number {
  const parts = formatterFor(timeZone).formatToParts(instant)
  const values: Record<string, number> = {}
  for (const part of parts) {
    if (part.type !== "literal") {
      values[part.type] = parseInt(part.value, 10)
    }
  }

  const asUtc = Date.UTC(
    values.year,
    values.month - 1,
    values.day,
    values.hour,
    values.minute,
    values.second
  )
  const wholeSeconds = Math.floor(instant.getTime() / 1000) * 1000
  return asUtc - wholeSeconds
}

export function toWallTime(instant: Date, timeZone: string): number {
  return instant.getTime() + timeZoneOffsetMs(instant, timeZone)
}

/**
 * Instant at which the zone's clock reads `wallMs`. Readings that fall in a
 * DST gap resolve to the instant after the gap.
 */
export function fromWallTime(wallMs: number, timeZone: string): Date {
  const guess = wallMs - timeZoneOffsetMs(new Date(wallMs), timeZone)
  return new Date(wallMs - timeZoneOffsetMs(new Date(guess), timeZone))
}

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i

/**
 * Parses an ISO-8601 string; values without an offset are wall time in
 * `timeZone`. Returns null for unparseable input.
 */
export function parseZonedInstant(value: string, timeZone: string): Date | null {
  const trimmed = value.trim()
  if (HAS_OFFSET.test(trimmed)) {
    const parsed = new Date(trimmed)
    return Number.isNaN(parsed.getTime()) ? null : parsed
  }

  const wall = new Date(`${trimmed}Z`)
  if (Number.isNaN(wall.getTime())) {
    return null
  }
  return fromWallTime(wall.getTime(), timeZone)
}
