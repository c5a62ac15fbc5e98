// Run configuration for gmail-relabel.
// CLI options are validated with zod and resolved into a typed RelabelConfig.
// File paths fall back to GMAIL_RELABEL_CREDENTIALS / GMAIL_RELABEL_TOKEN and
// then to the working directory defaults. Flags always win over env vars.

import path from 'node:path'
import { z } from 'zod'
import { ConfigError, DEFAULT_RETRY, type RetryOptions } from './api-utils.js'
import { DEFAULT_BATCH_SIZE } from './label-applier.js'
import { DEFAULT_RATE, QUOTA_UNITS } from './rate-limit.js'
import { parseDateArg, buildDateQuery } from './date-args.js'
import type { AuthPaths } from './auth.js'

export const DEFAULT_CREDENTIALS_FILE = 'credentials.json'
export const DEFAULT_TOKEN_FILE = 'oauth2token.json'

// The argument parser turns numeric-looking values into numbers.
const scalar = z.union([z.string(), z.number()]).transform(String)

/** Repeatable, comma-separated list option: `--label a,b --label c`. */
const listOption = z
  .union([scalar, z.array(scalar)])
  .optional()
  .transform((value) =>
    (value === undefined ? [] : Array.isArray(value) ? value : [value])
      .flatMap((v) => v.split(','))
      .map((v) => v.trim())
      .filter(Boolean),
  )

const authOptionsSchema = z.object({
  creds: scalar.optional(),
  token: scalar.optional(),
})

const relabelOptionsSchema = authOptionsSchema.extend({
  dryRun: z.boolean().default(false),
  debug: z.boolean().default(false),
  since: scalar.optional(),
  until: scalar.optional(),
  label: listOption,
  exclude: listOption,
  inherit: listOption,
  batchSize: z.coerce.number().int().min(1).max(DEFAULT_BATCH_SIZE).default(DEFAULT_BATCH_SIZE),
  maxAttempts: z.coerce.number().int().min(1).max(20).default(DEFAULT_RETRY.maxAttempts),
  // Every call must fit in the bucket, so the rate can't go below the costliest call.
  rate: z.coerce.number().min(QUOTA_UNITS.messagesBatchModify).default(DEFAULT_RATE),
})

export interface RelabelConfig extends AuthPaths {
  dryRun: boolean
  debug: boolean
  since?: string
  until?: string
  /** Gmail search query built from since/until. */
  query?: string
  labels: string[]
  exclude: string[]
  inherit: string[]
  batchSize: number
  rate: number
  retry: RetryOptions
}

type Env = Record<string, string | undefined>

function formatZodError(error: z.ZodError): { field: string; reason: string } {
  const issue = error.issues[0]
  if (!issue) return { field: 'options', reason: 'validation failed' }
  const field = issue.path.length > 0 ? `--${issue.path.join('.').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}` : 'options'
  return { field, reason: issue.message }
}

export function resolveAuthPaths(options: unknown, env: Env = process.env): AuthPaths | ConfigError {
  const parsed = authOptionsSchema.safeParse(options)
  if (!parsed.success) return new ConfigError({ ...formatZodError(parsed.error), cause: parsed.error })

  return {
    credentialsPath: path.resolve(parsed.data.creds ?? env.GMAIL_RELABEL_CREDENTIALS ?? DEFAULT_CREDENTIALS_FILE),
    tokenPath: path.resolve(parsed.data.token ?? env.GMAIL_RELABEL_TOKEN ?? DEFAULT_TOKEN_FILE),
  }
}

export function resolveRelabelConfig(
  options: unknown,
  { env = process.env, today = new Date() }: { env?: Env; today?: Date } = {},
): RelabelConfig | ConfigError {
  const parsed = relabelOptionsSchema.safeParse(options)
  if (!parsed.success) return new ConfigError({ ...formatZodError(parsed.error), cause: parsed.error })
  const opts = parsed.data

  const paths = resolveAuthPaths(opts, env)
  if (paths instanceof ConfigError) return paths

  const since = opts.since === undefined ? undefined : parseDateArg(opts.since, today)
  if (since instanceof ConfigError) return since
  const until = opts.until === undefined ? undefined : parseDateArg(opts.until, today)
  if (until instanceof ConfigError) return until
  if (since && until && since > until) {
    return new ConfigError({ field: '--since', reason: `${since} is after --until ${until}` })
  }

  return {
    ...paths,
    dryRun: opts.dryRun,
    debug: opts.debug,
    since,
    until,
    query: buildDateQuery({ since, until }),
    labels: opts.label,
    exclude: opts.exclude,
    inherit: opts.inherit,
    batchSize: opts.batchSize,
    rate: opts.rate,
    retry: { ...DEFAULT_RETRY, maxAttempts: opts.maxAttempts },
  }
}
