// Date argument parsing for --since / --until.
// Accepts YYYY-MM-DD, today, yesterday and "N <unit> ago" with day, week and
// year units. Dates resolve against the local calendar day and come back as
// YYYY-MM-DD; buildDateQuery turns them into a Gmail search query.

import { ConfigError } from './api-utils.js'

const DAY_UNITS = ['d', 'day', 'days']
const WEEK_UNITS = ['w', 'wk', 'wks', 'week', 'weeks']
const YEAR_UNITS = ['y', 'yr', 'yrs', 'year', 'years']

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

export function formatIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

function parseIsoDate(input: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input)
  if (!match) return null
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])]
  const date = new Date(year, month - 1, day)
  // Reject rollovers such as 2024-02-31
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return null
  return date
}

/** Parse a date argument into YYYY-MM-DD, relative to `today`. */
export function parseDateArg(input: string, today: Date = new Date()): string | ConfigError {
  const base = new Date(today.getFullYear(), today.getMonth(), today.getDate())
  const words = input.trim().toLowerCase().split(/\s+/)

  if (words.length === 1) {
    if (words[0] === 'today') return formatIsoDate(base)
    if (words[0] === 'yesterday') {
      base.setDate(base.getDate() - 1)
      return formatIsoDate(base)
    }
  }

  if (words.length === 3 && words[2] === 'ago' && /^\d+$/.test(words[0] ?? '')) {
    const amount = Number(words[0])
    const unit = words[1] ?? ''
    if (DAY_UNITS.includes(unit)) {
      base.setDate(base.getDate() - amount)
      return formatIsoDate(base)
    }
    if (WEEK_UNITS.includes(unit)) {
      base.setDate(base.getDate() - amount * 7)
      return formatIsoDate(base)
    }
    if (YEAR_UNITS.includes(unit)) {
      base.setFullYear(base.getFullYear() - amount)
      return formatIsoDate(base)
    }
  }

  const date = parseIsoDate(input.trim())
  if (date) return formatIsoDate(date)

  return new ConfigError({ field: 'date', reason: `"${input}" (use YYYY-MM-DD, today, yesterday or "N days|weeks|years ago")` })
}

/** Gmail search query for a date window: `after:2024/01/31 before:2024/03/01`. */
export function buildDateQuery({ since, until }: { since?: string; until?: string }): string | undefined {
  const filters: string[] = []
  if (since) filters.push(`after:${since.replace(/-/g, '/')}`)
  if (until) filters.push(`before:${until.replace(/-/g, '/')}`)
  return filters.length > 0 ? filters.join(' ') : undefined
}
