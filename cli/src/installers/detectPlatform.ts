import * as os from 'os'
import * as path from 'path'
import fs from 'fs-extra'
import type { OsFamily, PackageManager, PlatformDescriptor } from './types.js'
import { needCmd } from './utils.js'

// Probe order decides ties: the first manager found on PATH wins.
export const PACKAGE_MANAGER_PROBES: ReadonlyArray<readonly [PackageManager, string]> = [
  ['apt', 'apt-get'],
  ['dnf', 'dnf'],
  ['yum', 'yum'],
  ['pacman', 'pacman'],
  ['zypper', 'zypper'],
  ['brew', 'brew'],
  ['apk', 'apk']
]

const WINDOWS_KERNELS = /^(CYGWIN|MINGW|MSYS|Windows_NT)/

export function classifyKernel(kernel: string): OsFamily {
  if (kernel.startsWith('Linux')) return 'linux'
  if (kernel.startsWith('Darwin')) return 'macos'
  return 'unsupported'
}

export function isWindowsKernel(kernel: string): boolean {
  return WINDOWS_KERNELS.test(kernel)
}

export async function detectDistro(etcDir = '/etc'): Promise<string> {
  const osRelease = path.join(etcDir, 'os-release')
  if (await fs.pathExists(osRelease)) {
    // An unreadable os-release falls through to the marker files
    const txt = await fs.readFile(osRelease, 'utf8').catch(() => undefined)
    if (txt !== undefined) {
      const match = txt.match(/^ID=(.*)$/m)
      const id = match?.[1]?.trim().replace(/^["']|["']$/g, '')
      return id || 'unknown'
    }
  }
  if (await fs.pathExists(path.join(etcDir, 'redhat-release'))) return 'rhel'
  if (await fs.pathExists(path.join(etcDir, 'debian_version'))) return 'debian'
  return 'unknown'
}

export async function detectPackageManager(): Promise<PackageManager> {
  for (const [id, bin] of PACKAGE_MANAGER_PROBES) {
    if (await needCmd(bin)) return id
  }
  return 'unknown'
}

export async function detectPlatform(kernel: string = os.type()): Promise<PlatformDescriptor> {
  const family = classifyKernel(kernel)
  const distro = family === 'linux' ? await detectDistro() : undefined
  const packageManager = await detectPackageManager()
  return Object.freeze({ os: family, kernel, distro, packageManager })
}
