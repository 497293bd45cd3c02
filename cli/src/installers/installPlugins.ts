import type { InstallerContext, StepOutcome } from './types.js'
import * as path from 'path'
import { runCommand } from './utils.js'
import { fatalFrom } from './errors.js'

export function ephemeralSessionName(): string {
  return `plugin_install_${process.pid}_${Date.now()}`
}

async function serverRunning(): Promise<boolean> {
  const result = await runCommand('tmux', ['list-sessions'], { quiet: true })
  return result.ok
}

export async function installPlugins(ctx: InstallerContext): Promise<StepOutcome> {
  const installScript = path.join(ctx.paths.tpmDir, 'bin', 'install_plugins')
  ctx.logger.info('Installing tmux plugins...')

  if (await serverRunning()) {
    ctx.logger.info('Tmux is running, installing plugins against the existing server...')
    const result = await runCommand(installScript, [], { logger: ctx.logger })
    if (!result.ok) return fatalFrom(result)
    ctx.logger.ok('Plugins installed successfully!')
    return { status: 'done' }
  }

  ctx.logger.info('Starting tmux server to install plugins...')
  const start = await runCommand('tmux', ['start-server'], { logger: ctx.logger })
  if (!start.ok) return fatalFrom(start)

  const session = ephemeralSessionName()
  const created = await runCommand('tmux', ['new-session', '-d', '-s', session], { logger: ctx.logger })
  if (!created.ok) return fatalFrom(created)

  try {
    const result = await runCommand(installScript, [], { logger: ctx.logger })
    if (!result.ok) return fatalFrom(result)
  } finally {
    // The session only exists to host TPM; a failed kill is not worth reporting
    await runCommand('tmux', ['kill-session', '-t', session], { quiet: true })
  }

  ctx.logger.ok('Plugins installed successfully!')
  return { status: 'done' }
}
