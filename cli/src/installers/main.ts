import * as os from 'os'
import type { InstallOptions, InstallerContext, Logger, PlatformDescriptor, StepOutcome } from './types.js'
import { installDependencies } from './installDependencies.js'
import { backupConfig } from './backupConfig.js'
import { installPluginManager } from './installPluginManager.js'
import { deployConfig } from './deployConfig.js'
import { installPlugins } from './installPlugins.js'
import { findRepoRoot, resolvePaths } from './paths.js'
import { createLogger, defaultLogFile } from './logger.js'

export type StepName =
  | 'install-dependencies'
  | 'backup'
  | 'install-plugin-manager'
  | 'install-config'
  | 'install-plugins'

interface Step {
  name: StepName
  /** Returns the message to log when the user opted out of this step. */
  skipped?: (options: InstallOptions) => string | undefined
  run: (ctx: InstallerContext) => Promise<StepOutcome>
}

const STEPS: readonly Step[] = [
  {
    name: 'install-dependencies',
    skipped: (o) => (o.skipDeps ? 'Skipping dependency installation...' : undefined),
    run: installDependencies
  },
  {
    name: 'backup',
    skipped: (o) => (o.skipBackup ? 'Skipping backup...' : undefined),
    run: backupConfig
  },
  { name: 'install-plugin-manager', run: installPluginManager },
  { name: 'install-config', run: deployConfig },
  { name: 'install-plugins', run: installPlugins }
]

export interface InstallReport {
  outcomes: Array<{ step: StepName; outcome: StepOutcome }>
  /** Exit status for the process: 0 unless a step failed. */
  exitCode: number
}

export interface ContextInit {
  homeDir?: string
  rootDir?: string
  logFile?: string
  logger?: Logger
}

export function createContext(
  options: InstallOptions,
  platform: PlatformDescriptor,
  init: ContextInit = {}
): InstallerContext {
  const homeDir = init.homeDir ?? os.homedir()
  const rootDir = init.rootDir ?? findRepoRoot()
  const logFile = init.logger ? init.logFile : (init.logFile ?? defaultLogFile())
  return {
    logFile,
    paths: resolvePaths(homeDir, rootDir),
    platform,
    options,
    logger: init.logger ?? createLogger({ logFile })
  }
}

export async function runInstaller(ctx: InstallerContext): Promise<InstallReport> {
  const report: InstallReport = { outcomes: [], exitCode: 0 }

  for (const step of STEPS) {
    const optOut = step.skipped?.(ctx.options)
    if (optOut) {
      ctx.logger.info(optOut)
      report.outcomes.push({ step: step.name, outcome: { status: 'skipped', reason: optOut } })
      continue
    }

    const outcome = await step.run(ctx)
    report.outcomes.push({ step: step.name, outcome })

    if (outcome.status === 'warning') {
      ctx.logger.warn(outcome.message)
    } else if (outcome.status === 'skipped') {
      ctx.logger.info(outcome.reason)
    } else if (outcome.status === 'fatal') {
      // No rollback: whatever finished stays on disk, the backup covers the old config
      ctx.logger.err(outcome.error.message)
      report.exitCode = outcome.error.exitCode
      return report
    }
  }

  return report
}
