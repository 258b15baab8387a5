const HOURS = /(\d+(?:\.\d+)?)\s*(?:hours?|hrs?|h)\b/
const MINUTES = /(\d+(?:\.\d+)?)\s*(?:minutes?|mins?|m)\b/
const BARE_NUMBER = /^(\d+)$/

/**
 * Parse a human-written preparation time ("1 hr 30 min", "45 minutes",
 * "1.5 hours", "20") into whole minutes. Returns null when nothing usable
 * is found or the total is not positive.
 */
export function parsePrepTime(text: string): number | null {
  const input = text.trim().toLowerCase()
  if (!input) return null

  const hours = HOURS.exec(input)
  const minutes = MINUTES.exec(input)

  let total: number
  if (hours || minutes) {
    total = (hours ? parseFloat(hours[1]) * 60 : 0) + (minutes ? parseFloat(minutes[1]) : 0)
  } else {
    const bare = BARE_NUMBER.exec(input)
    if (!bare) return null
    total = parseInt(bare[1], 10)
  }

  return total > 0 ? Math.round(total) : null
}
