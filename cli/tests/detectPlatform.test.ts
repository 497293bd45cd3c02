import { describe, it, expect, vi, beforeEach } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'
import {
  PACKAGE_MANAGER_PROBES,
  classifyKernel,
  detectDistro,
  detectPackageManager,
  detectPlatform,
  isWindowsKernel
} from '../src/installers/detectPlatform.js'
import { needCmd } from '../src/installers/utils.js'
import { makeTempDir } from './helpers.js'

vi.mock('../src/installers/utils.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/utils.js')>('../src/installers/utils.js')
  return {
    ...actual,
    needCmd: vi.fn(async () => false)
  }
})

function onPath(...bins: string[]) {
  const available = new Set(bins)
  vi.mocked(needCmd).mockImplementation(async (cmd: string) => available.has(cmd))
}

describe('classifyKernel', () => {
  it('maps Linux and Darwin kernels', () => {
    expect(classifyKernel('Linux')).toBe('linux')
    expect(classifyKernel('Linux 6.8.0-45-generic')).toBe('linux')
    expect(classifyKernel('Darwin')).toBe('macos')
    expect(classifyKernel('Darwin 23.4.0')).toBe('macos')
  })

  it('treats everything else as unsupported', () => {
    for (const kernel of ['MINGW64_NT-10.0', 'MSYS_NT-10.0', 'CYGWIN_NT-10.0', 'Windows_NT', 'FreeBSD', 'SunOS', '']) {
      expect(classifyKernel(kernel)).toBe('unsupported')
    }
  })

  it('recognises Windows compatibility layers for the WSL hint', () => {
    expect(isWindowsKernel('MINGW64_NT-10.0')).toBe(true)
    expect(isWindowsKernel('CYGWIN_NT-10.0')).toBe(true)
    expect(isWindowsKernel('Windows_NT')).toBe(true)
    expect(isWindowsKernel('FreeBSD')).toBe(false)
    expect(isWindowsKernel('Linux')).toBe(false)
  })
})

describe('detectPackageManager', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('finds each manager when it is the only one on PATH', async () => {
    for (const [id, bin] of PACKAGE_MANAGER_PROBES) {
      onPath(bin)
      expect(await detectPackageManager()).toBe(id)
    }
  })

  it('probes apt through apt-get', async () => {
    onPath('apt')
    expect(await detectPackageManager()).toBe('unknown')
    onPath('apt-get')
    expect(await detectPackageManager()).toBe('apt')
  })

  it('prefers apt > dnf > yum > pacman > zypper > brew > apk', async () => {
    onPath('apt-get', 'dnf', 'yum', 'pacman', 'zypper', 'brew', 'apk')
    expect(await detectPackageManager()).toBe('apt')
    onPath('yum', 'dnf')
    expect(await detectPackageManager()).toBe('dnf')
    onPath('apk', 'brew', 'zypper')
    expect(await detectPackageManager()).toBe('zypper')
    onPath('apk', 'brew')
    expect(await detectPackageManager()).toBe('brew')
  })

  it('returns unknown when nothing is found', async () => {
    onPath()
    expect(await detectPackageManager()).toBe('unknown')
  })
})

describe('detectDistro', () => {
  it('reads ID from os-release', async () => {
    const etc = await makeTempDir('etc')
    await fs.writeFile(join(etc, 'os-release'), 'NAME="Ubuntu"\nID_LIKE=debian\nID=ubuntu\nVERSION_ID="24.04"\n')
    expect(await detectDistro(etc)).toBe('ubuntu')
  })

  it('strips quotes around the id', async () => {
    const etc = await makeTempDir('etc')
    await fs.writeFile(join(etc, 'os-release'), 'NAME="Fedora Linux"\nID="fedora"\n')
    expect(await detectDistro(etc)).toBe('fedora')
  })

  it('falls back to marker files', async () => {
    const rhel = await makeTempDir('etc')
    await fs.writeFile(join(rhel, 'redhat-release'), 'Red Hat Enterprise Linux release 9.3\n')
    expect(await detectDistro(rhel)).toBe('rhel')

    const debian = await makeTempDir('etc')
    await fs.writeFile(join(debian, 'debian_version'), '12.5\n')
    expect(await detectDistro(debian)).toBe('debian')
  })

  it('falls back to marker files when os-release cannot be read', async () => {
    const etc = await makeTempDir('etc')
    await fs.mkdir(join(etc, 'os-release'))
    await fs.writeFile(join(etc, 'debian_version'), '12.5\n')
    expect(await detectDistro(etc)).toBe('debian')
  })

  it('returns unknown without any release file', async () => {
    expect(await detectDistro(await makeTempDir('etc'))).toBe('unknown')
  })
})

describe('detectPlatform', () => {
  it('builds a frozen descriptor', async () => {
    onPath('brew')
    const platform = await detectPlatform('Darwin')
    expect(platform).toEqual({ os: 'macos', kernel: 'Darwin', distro: undefined, packageManager: 'brew' })
    expect(Object.isFrozen(platform)).toBe(true)
  })

  it('never throws for unsupported kernels', async () => {
    onPath()
    const platform = await detectPlatform('MINGW64_NT-10.0')
    expect(platform.os).toBe('unsupported')
    expect(platform.packageManager).toBe('unknown')
    expect(platform.distro).toBeUndefined()
  })
})
