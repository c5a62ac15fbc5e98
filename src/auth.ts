// OAuth2 authentication for gmail-relabel.
// Client credentials come from a Google "installed app" JSON file (as
// downloaded from the Cloud console). Tokens are cached in a JSON file next to
// it, together with the account email they belong to. Supports login
// (browser OAuth), token refresh, and a helper to get an authenticated
// GmailClient for the relabel run.

import http from 'node:http'
import readline from 'node:readline'
import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import fkill from 'fkill'
import pc from 'picocolors'
import { z } from 'zod'
import { GmailClient } from './gmail-client.js'
import { AuthError, ConfigError, type RetryOptions } from './api-utils.js'
import type { RateLimiter } from './rate-limit.js'

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

const REDIRECT_PORT = Number(process.env.GMAIL_RELABEL_REDIRECT_PORT ?? 8089)

// gmail.modify covers read + label changes; nothing broader is needed.
const SCOPES = ['https://www.googleapis.com/auth/gmail.modify']

export interface AuthPaths {
  credentialsPath: string
  tokenPath: string
}

// ---------------------------------------------------------------------------
// Credentials file
// ---------------------------------------------------------------------------

const clientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
})

const credentialsFileSchema = z.union([
  z.object({ installed: clientSecretsSchema }),
  z.object({ web: clientSecretsSchema }),
])

export interface ClientCredentials {
  clientId: string
  clientSecret: string
}

export function parseClientCredentials(json: unknown): ClientCredentials | ConfigError {
  const parsed = credentialsFileSchema.safeParse(json)
  if (!parsed.success) {
    return new ConfigError({
      field: 'credentials file',
      reason: 'expected an "installed" or "web" object with client_id and client_secret',
      cause: parsed.error,
    })
  }
  const secrets = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web
  return { clientId: secrets.client_id, clientSecret: secrets.client_secret }
}

function readJsonFile(filePath: string, field: string): unknown | ConfigError {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'))
  } catch (err) {
    return new ConfigError({ field, reason: `cannot read ${filePath}`, cause: err })
  }
}

export function loadClientCredentials(credentialsPath: string): ClientCredentials | ConfigError {
  const json = readJsonFile(credentialsPath, 'credentials file')
  if (json instanceof ConfigError) return json
  return parseClientCredentials(json)
}

export function createOAuth2Client(credentials: ClientCredentials): OAuth2Client {
  return new OAuth2Client({
    clientId: credentials.clientId,
    clientSecret: credentials.clientSecret,
    redirectUri: `http://localhost:${REDIRECT_PORT}`,
  })
}

// ---------------------------------------------------------------------------
// Token file
// ---------------------------------------------------------------------------

const tokenFileSchema = z.object({
  email: z.string(),
  tokens: z
    .object({
      access_token: z.string().nullish(),
      refresh_token: z.string().nullish(),
      expiry_date: z.number().nullish(),
      token_type: z.string().nullish(),
      scope: z.string().optional(),
      id_token: z.string().nullish(),
    })
    .passthrough(),
})

export type TokenFile = z.infer<typeof tokenFileSchema>

/** Returns null when no token has been saved yet. */
export function loadTokens(tokenPath: string): TokenFile | null | ConfigError {
  if (!fs.existsSync(tokenPath)) return null
  const json = readJsonFile(tokenPath, 'token file')
  if (json instanceof ConfigError) return json
  const parsed = tokenFileSchema.safeParse(json)
  if (!parsed.success) {
    return new ConfigError({ field: 'token file', reason: `${tokenPath} is malformed, run login again`, cause: parsed.error })
  }
  return parsed.data
}

export function saveTokens(tokenPath: string, data: { email: string; tokens: Credentials }): void {
  const dir = path.dirname(tokenPath)
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 })
  }
  // Owner read/write only: the file holds a refresh token
  fs.writeFileSync(tokenPath, JSON.stringify(data, null, 2), { mode: 0o600 })
}

// ---------------------------------------------------------------------------
// Browser OAuth flow
// ---------------------------------------------------------------------------

export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  try {
    const url = new URL(trimmed)
    const code = url.searchParams.get('code')
    if (code) return code
  } catch {
    // Not a URL
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

async function getAuthCodeFromBrowser(oauth2Client: OAuth2Client): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent', // force refresh token
  })

  // A stale login from an earlier run may still hold the port.
  await fkill(`:${REDIRECT_PORT}`, { force: true, silent: true })

  process.stderr.write('\n' + pc.bold('1.') + ' Open this URL to authorize:\n\n')
  process.stderr.write('   ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
  process.stderr.write(pc.bold('2.') + ' If running locally, the browser will redirect automatically.\n')
  process.stderr.write(pc.dim('   If running remotely, copy the URL from the browser address bar and paste it below.') + '\n\n')

  return new Promise((resolve, reject) => {
    let resolved = false
    let rl: readline.Interface | null = null

    function finish(code: string) {
      if (resolved) return
      resolved = true
      server.close()
      if (rl) {
        rl.close()
        process.stdin.unref()
      }
      resolve(code)
    }

    function fail(err: Error) {
      if (resolved) return
      resolved = true
      server.close()
      rl?.close()
      reject(err)
    }

    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://localhost:${REDIRECT_PORT}`)
      const code = url.searchParams.get('code')
      const error = url.searchParams.get('error')

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' })
        res.end(`<h1>Error: ${error}</h1>`)
        fail(new Error(error))
        return
      }

      if (code) {
        res.writeHead(200, { 'Content-Type': 'text/html' })
        res.end('<h1>Success! You can close this window.</h1>')
        finish(code)
        return
      }

      res.writeHead(400, { 'Content-Type': 'text/html' })
      res.end('<h1>No authorization code received</h1>')
    })

    server.on('error', fail)
    server.listen(REDIRECT_PORT)

    if (process.stdin.isTTY) {
      rl = readline.createInterface({ input: process.stdin, output: process.stderr })
      rl.question(pc.dim('Paste redirect URL here (or wait for auto-redirect): '), (answer) => {
        const code = extractCodeFromInput(answer)
        if (code) {
          finish(code)
        } else {
          process.stderr.write(pc.yellow('Could not extract authorization code from input.') + '\n')
          process.stderr.write(pc.dim('Waiting for browser redirect...') + '\n')
        }
      })
    }
  })
}

async function discoverEmail(auth: OAuth2Client): Promise<string | AuthError> {
  const client = new GmailClient({ auth, email: 'unknown' })
  const profile = await client.getProfile()
  if (profile instanceof AuthError) return profile
  if (profile instanceof Error) return new AuthError({ email: 'unknown', reason: profile.message, cause: profile })
  return profile.emailAddress
}

// ---------------------------------------------------------------------------
// Login / logout
// ---------------------------------------------------------------------------

/**
 * Run the full browser OAuth flow and save the tokens.
 * Returns the account email and the authenticated OAuth client.
 */
export async function login({ credentialsPath, tokenPath }: AuthPaths): Promise<{ email: string; auth: OAuth2Client } | AuthError | ConfigError> {
  const credentials = loadClientCredentials(credentialsPath)
  if (credentials instanceof Error) return credentials

  const oauth2Client = createOAuth2Client(credentials)

  let tokens: Credentials
  try {
    const code = await getAuthCodeFromBrowser(oauth2Client)
    process.stderr.write(pc.dim('Got authorization code, exchanging for tokens...') + '\n')
    tokens = (await oauth2Client.getToken(code)).tokens
  } catch (err) {
    return new AuthError({ email: 'unknown', reason: err instanceof Error ? err.message : String(err), cause: err })
  }
  oauth2Client.setCredentials(tokens)

  const email = await discoverEmail(oauth2Client)
  if (email instanceof Error) return email

  saveTokens(tokenPath, { email, tokens })
  return { email, auth: oauth2Client }
}

/** Delete the cached token. Returns false when there was nothing to delete. */
export function logout(tokenPath: string): boolean {
  if (!fs.existsSync(tokenPath)) return false
  fs.unlinkSync(tokenPath)
  return true
}

// ---------------------------------------------------------------------------
// Authenticated session
// ---------------------------------------------------------------------------

/**
 * Create an authenticated OAuth2Client from the cached token.
 * Refreshes if expired and saves the refreshed token back. Runs the browser
 * flow when no token is cached yet.
 */
export async function authenticate(paths: AuthPaths): Promise<{ email: string; auth: OAuth2Client } | AuthError | ConfigError> {
  const saved = loadTokens(paths.tokenPath)
  if (saved instanceof Error) return saved
  if (!saved) return login(paths)

  const credentials = loadClientCredentials(paths.credentialsPath)
  if (credentials instanceof Error) return credentials

  const oauth2Client = createOAuth2Client(credentials)
  const tokens: Credentials = saved.tokens
  oauth2Client.setCredentials(tokens)

  // Refresh if expired. Merge to keep refresh_token, which Google
  // often omits from refresh responses
  if (tokens.expiry_date && tokens.expiry_date < Date.now()) {
    if (!tokens.refresh_token) {
      return new AuthError({ email: saved.email, reason: 'token expired and no refresh token is stored' })
    }
    process.stderr.write(pc.dim(`Token expired for ${saved.email}, refreshing...`) + '\n')
    try {
      const { credentials: refreshed } = await oauth2Client.refreshAccessToken()
      const merged = { ...tokens, ...refreshed }
      oauth2Client.setCredentials(merged)
      saveTokens(paths.tokenPath, { email: saved.email, tokens: merged })
    } catch (err) {
      return new AuthError({ email: saved.email, reason: err instanceof Error ? err.message : String(err), cause: err })
    }
  }

  return { email: saved.email, auth: oauth2Client }
}

/** Get an authenticated GmailClient for the relabel run. */
export async function getClient(
  paths: AuthPaths,
  options: { retry?: RetryOptions; limiter?: RateLimiter } = {},
): Promise<{ email: string; client: GmailClient } | AuthError | ConfigError> {
  const session = await authenticate(paths)
  if (session instanceof Error) return session
  const client = new GmailClient({ auth: session.auth, email: session.email, ...options })
  return { email: session.email, client }
}

// ---------------------------------------------------------------------------
// Auth status (for whoami)
// ---------------------------------------------------------------------------

export interface AuthStatus {
  email: string
  expiresAt?: Date
  hasRefreshToken: boolean
}

export function getAuthStatus(tokenPath: string): AuthStatus | null | ConfigError {
  const saved = loadTokens(tokenPath)
  if (saved === null || saved instanceof Error) return saved
  return {
    email: saved.email,
    expiresAt: saved.tokens.expiry_date ? new Date(saved.tokens.expiry_date) : undefined,
    hasRefreshToken: Boolean(saved.tokens.refresh_token),
  }
}
