#!/usr/bin/env node

// gmail-relabel: Gmail label inheritance CLI built on cac.
// Entry point: registers all commands, global options, help, and version.
// Command options are validated with zod schemas (see config.ts).

import { cac } from 'cac'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerRelabelCommands } from './commands/relabel.js'
import * as out from './output.js'

const cli = cac('gmail-relabel')

// ---------------------------------------------------------------------------
// Global options
// ---------------------------------------------------------------------------

cli.option('--creds <file>', 'OAuth client credentials file (default: credentials.json, env GMAIL_RELABEL_CREDENTIALS)')
cli.option('--token <file>', 'Saved token file (default: oauth2token.json, env GMAIL_RELABEL_TOKEN)')
cli.option('--debug', 'Enable debug output')

// ---------------------------------------------------------------------------
// Default command: a subcommand is required
// ---------------------------------------------------------------------------

cli
  .command('[...args]', 'Show help')
  .action((args: string[]) => {
    if (args.length > 0) out.error(`Unknown command: ${args.join(' ')}`)
    else out.error('Exactly one subcommand is required')
    cli.outputHelp()
    process.exitCode = 1
  })

// `help [command]` re-parses as `[command] --help` so cac prints the matching help.
cli
  .command('help [command]', 'Show help for a command')
  .action((name: string | undefined) => {
    if (name && !cli.commands.some((c) => c.name === name)) {
      out.error(`Unknown command: ${name}`)
      process.exitCode = 1
      name = undefined
    }
    cli.parse([...process.argv.slice(0, 2), ...(name ? [name] : []), '--help'], { run: false })
  })

// ---------------------------------------------------------------------------
// Register all command modules (auth first so login/logout/whoami appear at top of --help)
// ---------------------------------------------------------------------------

registerAuthCommands(cli)
registerRelabelCommands(cli)

// ---------------------------------------------------------------------------
// Help & version
// ---------------------------------------------------------------------------

cli.help()
cli.version('0.1.0')

// ---------------------------------------------------------------------------
// Parse & run
// ---------------------------------------------------------------------------

try {
  cli.parse(process.argv, { run: false })
  await cli.runMatchedCommand()
} catch (err) {
  out.handleCommandError(err instanceof Error ? err : new Error(String(err)))
}
