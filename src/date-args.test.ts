import { describe, test, expect } from 'vitest'
import { ConfigError } from './api-utils.js'
import { buildDateQuery, parseDateArg } from './date-args.js'

const today = new Date(2024, 2, 15, 13, 45)

describe('parseDateArg', () => {
  test.each([
    ['today', '2024-03-15'],
    ['yesterday', '2024-03-14'],
    ['3 days ago', '2024-03-12'],
    ['10 d ago', '2024-03-05'],
    ['2 weeks ago', '2024-03-01'],
    ['1 year ago', '2023-03-15'],
    ['  Today ', '2024-03-15'],
    ['2024-02-29', '2024-02-29'],
  ])('%s -> %s', (input, expected) => {
    expect(parseDateArg(input, today)).toBe(expected)
  })

  test('rejects impossible calendar dates', () => {
    const result = parseDateArg('2023-02-29', today)
    expect(result).toBeInstanceOf(ConfigError)
  })

  test('rejects unknown formats', () => {
    const result = parseDateArg('last tuesday', today)
    expect(result).toBeInstanceOf(ConfigError)
    expect(result instanceof ConfigError && result.message).toBe(
      'Invalid date: "last tuesday" (use YYYY-MM-DD, today, yesterday or "N days|weeks|years ago")',
    )
  })
})

describe('buildDateQuery', () => {
  test('builds after/before filters', () => {
    expect(buildDateQuery({ since: '2024-01-31', until: '2024-03-01' })).toBe('after:2024/01/31 before:2024/03/01')
    expect(buildDateQuery({ since: '2024-01-31' })).toBe('after:2024/01/31')
    expect(buildDateQuery({})).toBeUndefined()
  })
})
