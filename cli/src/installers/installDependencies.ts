import type { InstallerContext, PackageManager, StepOutcome } from './types.js'
import { isRoot, runCommand } from './utils.js'
import { fatalFrom } from './errors.js'

const LINUX_PACKAGES = ['tmux', 'git', 'xclip']
const MACOS_PACKAGES = ['tmux', 'git', 'reattach-to-user-namespace']

type KnownManager = Exclude<PackageManager, 'unknown'>

interface InstallPlan {
  privileged: boolean
  commands: string[][]
}

const INSTALL_PLANS: Record<KnownManager, InstallPlan> = {
  apt: {
    privileged: true,
    commands: [['apt-get', 'update'], ['apt-get', 'install', '-y', ...LINUX_PACKAGES]]
  },
  dnf: { privileged: true, commands: [['dnf', 'install', '-y', ...LINUX_PACKAGES]] },
  yum: { privileged: true, commands: [['yum', 'install', '-y', ...LINUX_PACKAGES]] },
  pacman: { privileged: true, commands: [['pacman', '-Sy', '--noconfirm', ...LINUX_PACKAGES]] },
  zypper: { privileged: true, commands: [['zypper', 'install', '-y', ...LINUX_PACKAGES]] },
  brew: { privileged: false, commands: [['brew', 'install', ...MACOS_PACKAGES]] },
  apk: { privileged: true, commands: [['apk', 'add', ...LINUX_PACKAGES]] }
}

export function planFor(pm: KnownManager, asRoot: boolean): string[][] {
  const plan = INSTALL_PLANS[pm]
  if (!plan.privileged || asRoot) return plan.commands
  return plan.commands.map((argv) => ['sudo', ...argv])
}

export async function installDependencies(ctx: InstallerContext): Promise<StepOutcome> {
  const pm = ctx.platform.packageManager
  if (pm === 'unknown') {
    return { status: 'warning', message: 'Unknown package manager. Please install tmux and git manually.' }
  }

  ctx.logger.info('Installing dependencies...')
  for (const [cmd, ...args] of planFor(pm, isRoot())) {
    const result = await runCommand(cmd, args, { logger: ctx.logger })
    if (!result.ok) return fatalFrom(result)
  }
  ctx.logger.ok('Dependencies installed successfully!')
  return { status: 'done' }
}
