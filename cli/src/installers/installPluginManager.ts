import type { InstallerContext, StepOutcome } from './types.js'
import fs from 'fs-extra'
import * as path from 'path'
import { runCommand } from './utils.js'
import { fatalFrom } from './errors.js'
import { TPM_REPO_URL } from './paths.js'

export async function installPluginManager(ctx: InstallerContext): Promise<StepOutcome> {
  const tpmDir = ctx.paths.tpmDir

  if (await fs.pathExists(tpmDir)) {
    ctx.logger.info('TPM already installed, updating...')
    const result = await runCommand('git', ['pull'], { logger: ctx.logger, cwd: tpmDir })
    if (!result.ok) return fatalFrom(result)
  } else {
    ctx.logger.info('Installing Tmux Plugin Manager (TPM)...')
    await fs.ensureDir(path.dirname(tpmDir))
    const result = await runCommand('git', ['clone', TPM_REPO_URL, tpmDir], { logger: ctx.logger })
    if (!result.ok) return fatalFrom(result)
  }

  ctx.logger.ok('TPM installed successfully!')
  return { status: 'done', detail: tpmDir }
}
