import type { InstallerContext, StepOutcome } from './types.js'
import fs from 'fs-extra'
import * as path from 'path'
import { formatStamp } from './utils.js'
import { fatal } from './errors.js'

/**
 * Pick a backup directory name that does not exist yet. Two runs within the
 * same second get a numeric suffix rather than sharing a snapshot.
 */
export async function createBackupDir(root: string, now: Date = new Date()): Promise<string> {
  const base = path.join(root, `.tmux-backup-${formatStamp(now)}`)
  let candidate = base
  for (let n = 1; await fs.pathExists(candidate); n++) {
    candidate = `${base}-${n}`
  }
  await fs.ensureDir(candidate)
  return candidate
}

export async function backupConfig(ctx: InstallerContext): Promise<StepOutcome> {
  const { confFile, confDir, backupRoot } = ctx.paths
  if (!(await fs.pathExists(confFile))) {
    return { status: 'skipped', reason: 'No existing tmux config to back up' }
  }

  try {
    const backupDir = await createBackupDir(backupRoot)
    ctx.logger.info(`Backing up existing tmux config to ${backupDir}`)
    await fs.copy(confFile, path.join(backupDir, path.basename(confFile)))
    if (await fs.pathExists(confDir)) {
      await fs.copy(confDir, path.join(backupDir, path.basename(confDir)))
    }
    ctx.logger.ok(`Backup created at ${backupDir}`)
    return { status: 'done', detail: backupDir }
  } catch (error) {
    return fatal(`Backup failed: ${error instanceof Error ? error.message : String(error)}`)
  }
}
