export type OsFamily = 'linux' | 'macos' | 'unsupported'
export type PackageManager = 'apt' | 'dnf' | 'yum' | 'pacman' | 'zypper' | 'brew' | 'apk' | 'unknown'

export interface PlatformDescriptor {
  os: OsFamily
  kernel: string
  distro: string | undefined
  packageManager: PackageManager
}

export interface InstallOptions {
  skipDeps: boolean
  skipBackup: boolean
  force: boolean
}

export interface InstallPaths {
  confFile: string
  confDir: string
  tpmDir: string
  backupRoot: string
  templateConf: string
  templateDir: string
  templateMacosConf: string
}

export interface InstallerContext {
  logFile: string | undefined
  paths: InstallPaths
  platform: PlatformDescriptor
  options: InstallOptions
  logger: Logger
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}

export type CommandResult =
  | { ok: true }
  | { ok: false; exitCode: number | null; diagnostic: string }

export type StepOutcome =
  | { status: 'done'; detail?: string }
  | { status: 'skipped'; reason: string }
  | { status: 'warning'; message: string }
  | { status: 'fatal'; error: Error & { exitCode: number } }
