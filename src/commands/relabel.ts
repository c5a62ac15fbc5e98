// Relabel command: label inheritance across all labeled threads.
// Resolves config, authenticates, runs the relabel core and prints the run
// summary as YAML. The summary is printed whatever the outcome; the exit code
// tells schedulers whether anything failed.

import type { CAC } from 'cac'
import { getClient } from '../auth.js'
import { resolveRelabelConfig } from '../config.js'
import { RateLimiter } from '../rate-limit.js'
import { relabel, exitCodeFor } from '../relabel.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function registerRelabelCommands(cli: CAC) {
  cli
    .command('relabel', 'Relabel all messages in labeled threads (label inheritance)')
    .option('--dry-run', 'Show what would change without modifying anything')
    .option('--since <date>', 'Only threads more recent than a date (YYYY-MM-DD, today, yesterday, "3 days ago")')
    .option('--until <date>', 'Only threads older than a date (same formats as --since)')
    .option('--label <names>', 'Labels to inherit, comma-separated or repeated (default: all user labels)')
    .option('--exclude <ids>', 'Additional label ids that are never inherited (comma-separated)')
    .option('--inherit <ids>', 'System label ids to inherit anyway, e.g. IMPORTANT (comma-separated)')
    .option('--batch-size <n>', 'Max messages per label-add call (default: 1000)')
    .option('--max-attempts <n>', 'Attempts per API call on rate limits and transient errors (default: 5)')
    .option('--rate <units>', 'Gmail quota units per second (default: 250)')
    .example('gmail-relabel relabel --since "2 weeks ago" --dry-run')
    .example('gmail-relabel relabel --label Work,Receipts')
    .action(async (options: Record<string, unknown>) => {
      const config = resolveRelabelConfig(options)
      if (config instanceof Error) handleCommandError(config)
      out.setDebug(config.debug)

      const session = await getClient(config, {
        limiter: new RateLimiter({ rate: config.rate }),
        retry: {
          ...config.retry,
          onRetry: ({ attempt, delayMs, error }) => {
            out.debug(`attempt ${attempt} failed (${String(error)}), retrying in ${delayMs}ms`)
          },
        },
      })
      if (session instanceof Error) handleCommandError(session)
      out.hint(`${session.email}${config.dryRun ? ' (dry run, nothing will be modified)' : ''}`)
      if (config.query) out.debug(`query: ${config.query}`)

      // First Ctrl-C stops after the current thread, a second one exits immediately.
      const controller = new AbortController()
      const onSigint = () => {
        if (controller.signal.aborted) process.exit(130)
        controller.abort()
        out.hint('Stopping after the current thread (Ctrl-C again to quit now)')
      }
      process.on('SIGINT', onSigint)

      const result = await relabel(session.client, {
        exclude: config.exclude,
        inherit: config.inherit,
        labels: config.labels,
        query: config.query,
        batchSize: config.batchSize,
        dryRun: config.dryRun,
        signal: controller.signal,
        logger: { debug: out.debug, info: out.hint, warn: out.warn },
      })
      process.off('SIGINT', onSigint)
      if (result instanceof Error) handleCommandError(result)

      out.printYaml(out.summaryDocument(result))
      if (result.ok) {
        out.success(out.summaryLine(result))
      } else {
        out.error(out.summaryLine(result))
      }
      process.exitCode = exitCodeFor(result)
    })
}
