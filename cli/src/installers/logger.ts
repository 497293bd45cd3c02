import { chalk } from 'zx'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import type { Logger } from './types.js'
import { formatStamp } from './utils.js'

type Level = 'LOG' | 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR'

export interface LoggerOptions {
  /** Mirror every line, uncoloured, into this file. */
  logFile?: string
  write?: (line: string) => void
}

export function defaultLogFile(now: Date = new Date()): string {
  return path.join(os.tmpdir(), 'tmux-setup', `install-${formatStamp(now)}.log`)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stdout.write(line + '\n'))
  const logFile = options.logFile
  if (logFile) fs.ensureDirSync(path.dirname(logFile))

  const emit = (level: Level, colored: string, msg: string) => {
    write(colored)
    if (logFile) fs.appendFileSync(logFile, `[${new Date().toISOString()}] ${level}: ${msg}\n`)
  }

  return {
    log: (msg) => emit('LOG', chalk.dim(msg), msg),
    info: (msg) => emit('INFO', `${chalk.blue('[INFO]')} ${msg}`, msg),
    ok: (msg) => emit('SUCCESS', `${chalk.green('[SUCCESS]')} ${msg}`, msg),
    warn: (msg) => emit('WARNING', `${chalk.yellow('[WARNING]')} ${msg}`, msg),
    err: (msg) => emit('ERROR', `${chalk.red('[ERROR]')} ${msg}`, msg)
  }
}
