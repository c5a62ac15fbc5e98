// Auth commands: login, logout, whoami.
// Manages the cached OAuth token used by relabel.

import type { CAC } from 'cac'
import { login, logout, getAuthStatus } from '../auth.js'
import { resolveAuthPaths } from '../config.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

export function registerAuthCommands(cli: CAC) {
  cli
    .command('login', 'Authenticate with Google (opens browser). On a remote machine, paste back the localhost redirect URL containing the auth code.')
    .action(async (options: Record<string, unknown>) => {
      const paths = resolveAuthPaths(options)
      if (paths instanceof Error) handleCommandError(paths)

      const result = await login(paths)
      if (result instanceof Error) handleCommandError(result)
      out.success(`Authenticated as ${result.email}`)
      out.hint(`Token saved to ${paths.tokenPath}`)
      // The redirect server and stdin reader may still hold the event loop.
      process.exit(0)
    })

  cli
    .command('logout', 'Remove the saved token')
    .action((options: Record<string, unknown>) => {
      const paths = resolveAuthPaths(options)
      if (paths instanceof Error) handleCommandError(paths)

      if (logout(paths.tokenPath)) {
        out.success(`Removed ${paths.tokenPath}`)
      } else {
        out.hint('Not authenticated')
      }
    })

  cli
    .command('whoami', 'Show the authenticated account')
    .action((options: Record<string, unknown>) => {
      const paths = resolveAuthPaths(options)
      if (paths instanceof Error) handleCommandError(paths)

      const status = getAuthStatus(paths.tokenPath)
      if (status instanceof Error) handleCommandError(status)
      if (!status) {
        out.hint('Not authenticated. Run: gmail-relabel login')
        return
      }

      out.printYaml({
        email: status.email,
        token_file: paths.tokenPath,
        refresh_token: status.hasRefreshToken,
        expires: status.expiresAt?.toISOString() ?? 'unknown',
      })
    })
}
