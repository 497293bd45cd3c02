import type { InstallerContext, StepOutcome } from './types.js'
import fs from 'fs-extra'
import { fatal } from './errors.js'

export async function deployConfig(ctx: InstallerContext): Promise<StepOutcome> {
  const { confFile, confDir, templateConf, templateDir, templateMacosConf } = ctx.paths

  if (!(await fs.pathExists(templateConf))) {
    ctx.logger.err(`tmux config template missing at ${templateConf}`)
    return fatal(`Template not found: ${templateConf}`)
  }

  ctx.logger.info('Installing tmux configuration...')
  try {
    await fs.ensureDir(confDir)
    await fs.copy(templateConf, confFile, { overwrite: true })

    if (await fs.pathExists(templateDir)) {
      // Merge into ~/.tmux so plugins/ and other user files stay in place
      await fs.copy(templateDir, confDir, { overwrite: true })
    }

    // Platform overrides go last so they win over the base settings
    if (ctx.platform.os === 'macos') {
      ctx.logger.info('Applying macOS-specific settings...')
      const base = await fs.readFile(confFile, 'utf8')
      const fragment = await fs.readFile(templateMacosConf, 'utf8')
      const separator = base.length > 0 && !base.endsWith('\n') ? '\n' : ''
      await fs.appendFile(confFile, separator + fragment)
    }
  } catch (error) {
    return fatal(`Could not install tmux configuration: ${error instanceof Error ? error.message : String(error)}`)
  }

  ctx.logger.ok('Configuration installed successfully!')
  return { status: 'done', detail: confFile }
}
