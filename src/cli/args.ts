/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  input: string
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** 'stdout', a file path, or undefined for human-readable output */
  jsonOutput: string | undefined
  /** Unset options fall back to the config file, then built-in defaults */
  timeWindow: string | undefined
  detailLevel: string | undefined
  mediaBudget: number | undefined
  includeMedia: boolean | undefined
  model: string | undefined
  /** For preview command: media entry name inside the archive */
  filename: string | undefined
  /** For preview command: where to write the JPEG */
  outputFile: string | undefined
  /** For preview command: full resolution instead of a thumbnail */
  full: boolean
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Summarize exported WhatsApp chats with Google Gemini.

Input is the .zip archive produced by WhatsApp's "Export chat" (with or
without media). Set GEMINI_API_KEY before running summarize.

Examples:
  $ chat-digest parse "WhatsApp Chat.zip"
  $ chat-digest stats "WhatsApp Chat.zip" --window last-30d
  $ chat-digest summarize "WhatsApp Chat.zip" --window last-7d --detail brief
  $ chat-digest preview "WhatsApp Chat.zip" VID-20240101-WA0001.mp4 -o still.jpg`

const WINDOW_HELP = 'Time window: last-24h, last-7d, last-30d, all-time'

function createProgram(): Command {
  const program = new Command()
    .name('chat-digest')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set CHAT_DIGEST_CONFIG)')

  // ============ PARSE ============
  program
    .command('parse')
    .description('Parse and validate a chat export: count messages, media and participants')
    .argument('<input>', 'Chat export (.zip)')
    .option('--json [file]', 'Output messages as JSON (to file if specified, otherwise stdout)')

  // ============ STATS ============
  program
    .command('stats')
    .description('Show per-participant text and media activity for a time window')
    .argument('<input>', 'Chat export (.zip)')
    .option('-w, --window <window>', WINDOW_HELP)
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ SUMMARIZE ============
  program
    .command('summarize')
    .description('Summarize a time window of the chat with Gemini')
    .argument('<input>', 'Chat export (.zip)')
    .option('-w, --window <window>', WINDOW_HELP)
    .option('-d, --detail <level>', 'Detail level: brief, standard, verbose')
    .option('--media-budget <num>', 'Max media files attached to the request')
    .option('--no-media', 'Send the transcript only')
    .option('--model <name>', 'Gemini model name')
    .option('--json [file]', 'Output as JSON (to file if specified, otherwise stdout)')

  // ============ PREVIEW ============
  program
    .command('preview')
    .description('Write a JPEG still of an image or video in the archive')
    .argument('<input>', 'Chat export (.zip)')
    .argument('<filename>', 'Media entry name, e.g. IMG-20240101-WA0001.jpg')
    .option('-o, --output <file>', 'Output JPEG path (default: <filename>.jpg)')
    .option('--full', 'Full resolution instead of a thumbnail')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  chat-digest config                             List current settings
  chat-digest config set detailLevel brief       Shorter summaries
  chat-digest config set includeMedia false      Never attach media
  chat-digest config unset model                 Back to the default model`
    )

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  const budget = optionalString(opts.mediaBudget)

  return {
    command: commandName,
    input,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: optionalString(opts.configFile),
    jsonOutput:
      opts.json === true ? 'stdout' : typeof opts.json === 'string' ? opts.json : undefined,
    timeWindow: optionalString(opts.window),
    detailLevel: optionalString(opts.detail),
    mediaBudget: budget !== undefined ? Number.parseInt(budget, 10) : undefined,
    // --no-media sets media=false; its implicit default (true) must not override config
    includeMedia: opts.media === false ? false : undefined,
    model: optionalString(opts.model),
    filename: undefined,
    outputFile: optionalString(opts.output),
    full: opts.full === true,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Attach action handlers that capture parsed args.
 * optsWithGlobals() includes global options from the parent program.
 */
function captureArgs(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    cmd.action((input?: string) => {
      onParsed(buildCLIArgs(cmd.name(), input ?? '', cmd.optsWithGlobals()))
    })
  }

  // Handle preview command with input and filename arguments
  const previewCmd = program.commands.find((c) => c.name() === 'preview')
  if (previewCmd) {
    previewCmd.action((input: string, filename: string) => {
      onParsed({
        ...buildCLIArgs('preview', input, previewCmd.optsWithGlobals()),
        filename
      })
    })
  }

  // Handle config command with action, key, value arguments
  const configCmd = program.commands.find((c) => c.name() === 'config')
  if (configCmd) {
    configCmd.action((action?: string, key?: string, value?: string) => {
      onParsed({
        ...buildCLIArgs('config', '', configCmd.optsWithGlobals()),
        configAction: parseConfigAction(action),
        configKey: key,
        configValue: value
      })
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', '', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    const silent = { writeOut: () => {}, writeErr: () => {} }
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput(silent)
    }
  }

  let result: CLIArgs | null = null
  captureArgs(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    return buildCLIArgs('help', '', {})
  }

  return result ?? buildCLIArgs('help', '', {})
}
