// Output formatting utilities for the gmail-relabel CLI.
// Data goes to stdout as YAML (js-yaml); hints, progress and errors go to
// stderr so piped output stays machine-parseable.
// In TTY mode keys are dimmed and list dashes cyan; in non-TTY mode colors are
// disabled. Line wrapping is off everywhere.

import yaml from 'js-yaml'
import pc from 'picocolors'
import { AuthError } from './api-utils.js'
import type { RelabelSummary } from './relabel.js'

// ---------------------------------------------------------------------------
// TTY detection
// ---------------------------------------------------------------------------

const isTTY = process.stdout.isTTY ?? false

let debugEnabled = false

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled
}

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

/**
 * Colorize a YAML string for TTY output.
 * List dashes are cyan, keys are dimmed, values stay at terminal default.
 */
export function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = toYaml(data)
  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

/** Snake-cased summary document, the shape printed on stdout. */
export function summaryDocument(summary: RelabelSummary): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    dry_run: summary.dryRun,
    labels_considered: summary.labelsConsidered,
    threads_scanned: summary.threadsScanned,
    threads_reconciled: summary.threadsReconciled,
    threads_partial: summary.threadsPartial,
    threads_failed: summary.threadsFailed,
    messages_modified: summary.messagesModified,
    labels_added: summary.labelsAdded,
  }
  if (summary.interrupted) doc.interrupted = true
  if (summary.aborted) doc.aborted = true
  if (summary.changes.length > 0) {
    doc.changes = summary.changes.map((c) => ({ thread_id: c.threadId, message_id: c.messageId, add: c.add }))
  }
  if (summary.failures.length > 0) {
    doc.failures = summary.failures.map((f) => ({
      stage: f.stage,
      ...(f.threadId ? { thread_id: f.threadId } : {}),
      reason: f.reason,
    }))
  }
  return doc
}

/** One-line summary for stderr, e.g. "Scanned 3 thread(s), modified 2 message(s), added 3 label(s)". */
export function summaryLine(summary: RelabelSummary): string {
  const verb = summary.dryRun ? 'would modify' : 'modified'
  const added = summary.dryRun ? 'would add' : 'added'
  let line = `Scanned ${summary.threadsScanned} thread(s), ${verb} ${summary.messagesModified} message(s), ${added} ${summary.labelsAdded} label(s)`
  const problems: string[] = []
  if (summary.threadsFailed > 0) problems.push(`${summary.threadsFailed} failed`)
  if (summary.threadsPartial > 0) problems.push(`${summary.threadsPartial} partial`)
  if (problems.length > 0) line += `; threads ${problems.join(', ')}`
  return line
}

// ---------------------------------------------------------------------------
// Stderr hints (data to stdout, hints to stderr)
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function warn(msg: string): void {
  process.stderr.write(pc.yellow(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

export function debug(msg: string): void {
  if (!debugEnabled) return
  process.stderr.write(pc.dim(`debug: ${msg}`) + '\n')
}

// ---------------------------------------------------------------------------
// Centralized command error handler
// ---------------------------------------------------------------------------

/** Print a user-friendly message to stderr and exit.
 *  AuthError gets a "Try: gmail-relabel login" hint; all others print their message.
 *  With --debug the cause is printed as well. */
export function handleCommandError(err: Error): never {
  if (err instanceof AuthError) {
    error(`${err.message}. Try: gmail-relabel login`)
  } else {
    error(err.message)
  }
  if (err.cause !== undefined) debug(`cause: ${String(err.cause)}`)
  process.exit(1)
}
