import { accessSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join, resolve } from 'path'
import type { InstallPaths } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

export const TPM_REPO_URL = 'https://github.com/tmux-plugins/tpm'

export function findRepoRoot(start: string = __dirname): string {
  // Walk up to 6 levels looking for templates/tmux.conf
  let cur = start
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'templates', 'tmux.conf'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(start, '..')
}

export function resolvePaths(homeDir: string, rootDir: string): InstallPaths {
  const confDir = join(homeDir, '.tmux')
  return {
    confFile: join(homeDir, '.tmux.conf'),
    confDir,
    tpmDir: join(confDir, 'plugins', 'tpm'),
    backupRoot: homeDir,
    templateConf: join(rootDir, 'templates', 'tmux.conf'),
    templateDir: join(rootDir, 'templates', 'tmux'),
    templateMacosConf: join(rootDir, 'templates', 'tmux.macos.conf')
  }
}
