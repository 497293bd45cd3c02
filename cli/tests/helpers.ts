import { vi } from 'vitest'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { InstallOptions, InstallerContext, Logger, OsFamily, PackageManager } from '../src/installers/types.js'
import { resolvePaths } from '../src/installers/paths.js'

export const BASE_CONF = 'set -g prefix C-a\nset -g mouse on\n'
export const MACOS_CONF = 'set -g default-command "reattach-to-user-namespace -l $SHELL"\n'
export const THEME_CONF = 'set -g status-position bottom\n'

export async function makeTempDir(label: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `tmux-setup-test-${label}-`))
}

/** A repo root holding a small templates/ bundle. */
export async function makeRepoRoot(base: string = BASE_CONF): Promise<string> {
  const root = await makeTempDir('root')
  await fs.mkdir(join(root, 'templates', 'tmux'), { recursive: true })
  await fs.writeFile(join(root, 'templates', 'tmux.conf'), base, 'utf8')
  await fs.writeFile(join(root, 'templates', 'tmux.macos.conf'), MACOS_CONF, 'utf8')
  await fs.writeFile(join(root, 'templates', 'tmux', 'theme.conf'), THEME_CONF, 'utf8')
  return root
}

export function mockLogger(): Logger {
  return { log: vi.fn(), info: vi.fn(), ok: vi.fn(), warn: vi.fn(), err: vi.fn() }
}

export interface CtxInit {
  homeDir: string
  rootDir?: string
  os?: OsFamily
  packageManager?: PackageManager
  options?: Partial<InstallOptions>
}

export function makeCtx(init: CtxInit): InstallerContext {
  const rootDir = init.rootDir ?? init.homeDir
  return {
    logFile: undefined,
    paths: resolvePaths(init.homeDir, rootDir),
    platform: {
      os: init.os ?? 'linux',
      kernel: init.os === 'macos' ? 'Darwin' : 'Linux',
      distro: init.os === 'macos' ? undefined : 'debian',
      packageManager: init.packageManager ?? 'apt'
    },
    options: { skipDeps: false, skipBackup: false, force: true, ...init.options },
    logger: mockLogger()
  }
}

export async function backupDirsIn(homeDir: string): Promise<string[]> {
  return (await fs.readdir(homeDir)).filter((n) => n.startsWith('.tmux-backup-')).sort()
}
