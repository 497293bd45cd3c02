import { defineCommand, renderUsage } from 'citty'
import type { ArgsDef } from 'citty'
import * as p from '@clack/prompts'
import { detectPlatform, isWindowsKernel } from '../installers/detectPlatform.js'
import { createContext, runInstaller } from '../installers/main.js'
import type { ContextInit, InstallReport } from '../installers/main.js'
import { createLogger } from '../installers/logger.js'
import { readKeystroke } from '../installers/utils.js'
import type { InstallOptions, InstallerContext, PlatformDescriptor } from '../installers/types.js'

export const installArgs = {
  'skip-deps': { type: 'boolean', description: 'Skip installing system dependencies' },
  'skip-backup': { type: 'boolean', description: 'Skip backing up existing configuration' },
  force: { type: 'boolean', alias: ['f'], description: 'Force installation without prompts' }
} satisfies ArgsDef

export type ParsedInstallArgs =
  | { kind: 'options'; options: InstallOptions }
  | { kind: 'help' }
  | { kind: 'error'; token: string }

/**
 * Strict left-to-right parse of the raw tokens; the first help flag or
 * unknown token decides the result.
 */
export function parseInstallArgs(tokens: readonly string[]): ParsedInstallArgs {
  const options: InstallOptions = { skipDeps: false, skipBackup: false, force: false }
  for (const token of tokens) {
    switch (token) {
      case '--skip-deps':
        options.skipDeps = true
        break
      case '--skip-backup':
        options.skipBackup = true
        break
      case '--force':
      case '-f':
        options.force = true
        break
      case '--help':
      case '-h':
        return { kind: 'help' }
      default:
        return { kind: 'error', token }
    }
  }
  return { kind: 'options', options: Object.freeze(options) }
}

export interface CliInit extends ContextInit {
  detect?: () => Promise<PlatformDescriptor>
  /** Where the confirmation is read from; stdin by default. */
  input?: NodeJS.ReadableStream & { isTTY?: boolean }
}

async function confirmInstall(input: NodeJS.ReadableStream & { isTTY?: boolean }): Promise<boolean> {
  p.intro('tmux-setup · Install')
  p.note(
    [
      '- tmux (if not installed)',
      '- Tmux Plugin Manager (TPM)',
      '- Custom tmux configuration',
      '- Essential tmux plugins'
    ].join('\n'),
    'This will install'
  )

  if (!input.isTTY) {
    // Piped answers: a single character, only y/Y goes ahead
    process.stdout.write('Continue? [y/N] ')
    const key = await readKeystroke(input)
    process.stdout.write('\n')
    return key === 'y' || key === 'Y'
  }

  const answer = await p.confirm({ message: 'Continue?', initialValue: false })
  return !p.isCancel(answer) && answer
}

export async function runInstallCli(tokens: readonly string[], init: CliInit = {}): Promise<number> {
  // Console-only until the run is confirmed: nothing may touch disk before that
  const logger = init.logger ?? createLogger()
  const parsed = parseInstallArgs(tokens)

  if (parsed.kind === 'help') {
    process.stdout.write((await renderUsage(installCommand)) + '\n')
    return 0
  }
  if (parsed.kind === 'error') {
    logger.err(`Unknown option: ${parsed.token}`)
    return 1
  }
  const { options } = parsed

  const platform = await (init.detect ?? detectPlatform)()
  logger.info(`Detected OS: ${platform.os}`)
  if (platform.os === 'linux') logger.info(`Detected Distro: ${platform.distro ?? 'unknown'}`)
  logger.info(`Detected Package Manager: ${platform.packageManager}`)

  if (platform.os === 'unsupported') {
    logger.err(`Unsupported operating system: ${platform.kernel}`)
    logger.info('This installer supports Linux and macOS only.')
    if (isWindowsKernel(platform.kernel)) {
      logger.info('For Windows, please use WSL (Windows Subsystem for Linux).')
    }
    return 1
  }

  if (!options.force && !(await confirmInstall(init.input ?? process.stdin))) {
    logger.info('Installation cancelled.')
    return 0
  }

  const ctx = createContext(options, platform, init)
  const report = await runInstaller(ctx)
  if (report.exitCode !== 0) return report.exitCode

  printPostInstallSummary(ctx, report)
  return 0
}

export const installCommand = defineCommand({
  meta: {
    name: 'tmux-setup',
    description: 'Install the tmux configuration, TPM and plugins'
  },
  args: installArgs,
  async run({ rawArgs }) {
    return runInstallCli(rawArgs)
  }
})

function printPostInstallSummary(ctx: InstallerContext, report: InstallReport) {
  const backup = report.outcomes.find((o) => o.step === 'backup')?.outcome
  const lines: string[] = []
  lines.push('')
  lines.push('tmux-setup: Installation complete!')
  lines.push('──────────────────────────────────')
  lines.push(`Config: ${ctx.paths.confFile}`)
  lines.push(`Plugins: ${ctx.paths.tpmDir}`)
  if (backup?.status === 'done' && backup.detail) lines.push(`Backup: ${backup.detail}`)
  if (ctx.logFile) lines.push(`Log: ${ctx.logFile}`)
  lines.push('')
  lines.push('To start using tmux:')
  lines.push('  1. Start a new terminal session')
  lines.push('  2. Run: tmux')
  lines.push('')
  lines.push('Quick reference:')
  lines.push('  Prefix key:        Ctrl+a')
  lines.push('  Reload config:     prefix + r')
  lines.push('  Split horizontal:  prefix + |')
  lines.push('  Split vertical:    prefix + -')
  lines.push('')
  lines.push('For more keybindings, see the README.md')
  lines.push('')
  process.stdout.write(lines.join('\n') + '\n')
}
