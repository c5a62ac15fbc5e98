// Gmail API client for the relabel run.
// Wraps the googleapis Gmail SDK with the four calls the relabel core needs
// (labels.list, threads.list, threads.get, messages.batchModify) and
// implements MailboxSession on top of them.
// Every call spends its quota cost on the shared rate limiter, retries
// transient failures with backoff, and returns errors as values.

import { google, type gmail_v1 } from 'googleapis'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import {
  withRetry,
  DEFAULT_RETRY,
  AuthError,
  ApiError,
  NotFoundError,
  isAuthLikeError,
  isNotFoundError,
  type RetryOptions,
} from './api-utils.js'
import { RateLimiter, QUOTA_UNITS } from './rate-limit.js'
import type { MailboxSession, MailLabel, ThreadMessages, ThreadPage } from './mailbox.js'

/** Max page size accepted by threads.list. */
const THREADS_PAGE_SIZE = 500

/** Boundary helper: run a googleapis SDK call, converting auth-like errors to AuthError values.
 *  Non-auth errors are wrapped in ApiError so they remain error values (no throwing).
 *  Original error is preserved as `cause` for debugging. */
function gmailBoundary<T>(email: string, fn: () => Promise<T>): Promise<T | AuthError | ApiError> {
  return errore.tryAsync({
    try: fn,
    catch: (err) => isAuthLikeError(err)
      ? new AuthError({ email, reason: errorReason(err), cause: err })
      : new ApiError({ reason: errorReason(err), cause: err }),
  })
}

function errorReason(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** The slice of `gmail.users` the client calls. googleapis' `gmail_v1.Gmail['users']` satisfies it. */
export interface GmailUsersApi {
  getProfile(params: gmail_v1.Params$Resource$Users$Getprofile): Promise<{ data: gmail_v1.Schema$Profile }>
  labels: {
    list(params: gmail_v1.Params$Resource$Users$Labels$List): Promise<{ data: gmail_v1.Schema$ListLabelsResponse }>
  }
  threads: {
    list(params: gmail_v1.Params$Resource$Users$Threads$List): Promise<{ data: gmail_v1.Schema$ListThreadsResponse }>
    get(params: gmail_v1.Params$Resource$Users$Threads$Get): Promise<{ data: gmail_v1.Schema$Thread }>
  }
  messages: {
    batchModify(params: gmail_v1.Params$Resource$Users$Messages$Batchmodify): Promise<unknown>
  }
}

export class GmailClient implements MailboxSession {
  readonly email: string
  private users: GmailUsersApi
  private limiter: RateLimiter
  private retry: RetryOptions

  constructor({
    auth,
    email,
    limiter = new RateLimiter(),
    retry = DEFAULT_RETRY,
    users,
  }: {
    auth: OAuth2Client
    email: string
    limiter?: RateLimiter
    retry?: RetryOptions
    /** Replaces the googleapis transport, e.g. with an in-process fake. */
    users?: GmailUsersApi
  }) {
    this.users = users ?? google.gmail({ version: 'v1', auth }).users
    this.email = email
    this.limiter = limiter
    this.retry = retry
  }

  /** Rate-limited, retried call through the error boundary. */
  private call<T>(units: number, fn: () => Promise<T>): Promise<T | AuthError | ApiError> {
    return gmailBoundary(this.email, () =>
      withRetry(async () => {
        await this.limiter.wait(units)
        return fn()
      }, this.retry),
    )
  }

  // =========================================================================
  // Account / profile
  // =========================================================================

  async getProfile(): Promise<{ emailAddress: string; messagesTotal: number; threadsTotal: number } | AuthError | ApiError> {
    const res = await this.call(QUOTA_UNITS.getProfile, () =>
      this.users.getProfile({ userId: 'me' }),
    )
    if (res instanceof Error) return res
    return {
      emailAddress: res.data.emailAddress ?? this.email,
      messagesTotal: res.data.messagesTotal ?? 0,
      threadsTotal: res.data.threadsTotal ?? 0,
    }
  }

  // =========================================================================
  // Labels
  // =========================================================================

  async listLabels(): Promise<MailLabel[] | AuthError | ApiError> {
    const res = await this.call(QUOTA_UNITS.labelsList, () =>
      this.users.labels.list({ userId: 'me' }),
    )
    if (res instanceof Error) return res
    return GmailClient.parseRawLabels(res.data.labels ?? [])
  }

  // =========================================================================
  // Threads
  // =========================================================================

  async listThreads({
    labelId,
    query,
    pageToken,
  }: {
    labelId: string
    query?: string
    pageToken?: string
  }): Promise<ThreadPage | AuthError | ApiError> {
    const res = await this.call(QUOTA_UNITS.threadsList, () =>
      this.users.threads.list({
        userId: 'me',
        labelIds: [labelId],
        q: query || undefined,
        maxResults: THREADS_PAGE_SIZE,
        pageToken: pageToken || undefined,
      }),
    )
    if (res instanceof Error) return res
    return GmailClient.parseRawThreadPage(res.data)
  }

  async getThreadMessages({ threadId }: { threadId: string }): Promise<ThreadMessages | NotFoundError | AuthError | ApiError> {
    // format=minimal: ids and per-message labelIds, no headers or bodies
    const res = await this.call(QUOTA_UNITS.threadsGet, () =>
      this.users.threads.get({
        userId: 'me',
        id: threadId,
        format: 'minimal',
      }),
    )
    if (res instanceof ApiError && isNotFoundError(res.cause)) {
      return new NotFoundError({ resource: `thread ${threadId}`, cause: res.cause })
    }
    if (res instanceof Error) return res
    return GmailClient.parseRawThreadMessages(threadId, res.data)
  }

  // =========================================================================
  // Label mutations (additive only)
  // =========================================================================

  async addLabels({ messageIds, labelIds }: { messageIds: string[]; labelIds: string[] }): Promise<void | AuthError | ApiError> {
    if (messageIds.length === 0 || labelIds.length === 0) return
    const res = await this.call(QUOTA_UNITS.messagesBatchModify, async () => {
      await this.users.messages.batchModify({
        userId: 'me',
        requestBody: { ids: messageIds, addLabelIds: labelIds },
      })
    })
    if (res instanceof Error) return res
  }

  // =========================================================================
  // Static: parse raw Google API responses
  // =========================================================================

  static parseRawLabels(raw: gmail_v1.Schema$Label[]): MailLabel[] {
    return raw.flatMap((l) => {
      if (!l.id) return []
      return [{
        id: l.id,
        name: l.name ?? l.id,
        type: l.type === 'system' ? 'system' as const : 'user' as const,
      }]
    })
  }

  static parseRawThreadPage(raw: gmail_v1.Schema$ListThreadsResponse): ThreadPage {
    return {
      threadIds: (raw.threads ?? []).flatMap((t) => (t.id ? [t.id] : [])),
      nextPageToken: raw.nextPageToken || null,
    }
  }

  static parseRawThreadMessages(threadId: string, raw: gmail_v1.Schema$Thread): ThreadMessages {
    return {
      id: raw.id ?? threadId,
      messages: (raw.messages ?? []).flatMap((m) =>
        m.id ? [{ id: m.id, labelIds: [...new Set(m.labelIds ?? [])] }] : [],
      ),
    }
  }
}
