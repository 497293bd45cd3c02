import { which } from 'zx'
import { spawn } from 'node:child_process'
import type { CommandResult, Logger } from './types.js'

// zx `$` is great for templated calls, but for dynamic
// cmd + args we use Node's spawn and report a result instead of throwing.

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export interface RunOptions {
  logger?: Logger
  cwd?: string
  /** Discard stdout and capture stderr instead of inheriting the terminal. */
  quiet?: boolean
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}

export async function runCommand(
  cmd: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const cmdStr = formatCommand(cmd, args)
  options.logger?.log(`$ ${cmdStr}`)
  const proc = spawn(cmd, args, {
    stdio: options.quiet ? ['ignore', 'ignore', 'pipe'] : 'inherit',
    cwd: options.cwd || process.cwd(),
    shell: false
  })
  let stderr = ''
  proc.stderr?.on('data', (chunk: Buffer) => {
    stderr += chunk.toString()
  })
  return new Promise<CommandResult>((resolve) => {
    proc.on('error', (error) => {
      resolve({ ok: false, exitCode: null, diagnostic: `Could not start ${cmdStr}: ${error.message}` })
    })
    proc.on('close', (code) => {
      if (code === 0) return resolve({ ok: true })
      const detail = stderr.trim()
      resolve({
        ok: false,
        exitCode: code,
        diagnostic: `Command failed (${code}): ${cmdStr}${detail ? `\n${detail}` : ''}`
      })
    })
  })
}

/** Local time as YYYYMMDD_HHMMSS, the same shape `date +%Y%m%d_%H%M%S` prints. */
export function formatStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0')
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

export function isRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0
}

/** First character written to `input`, or '' once it ends without any. */
export async function readKeystroke(input: NodeJS.ReadableStream): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onData = (chunk: string | Buffer) => finish(() => resolve(String(chunk).charAt(0)))
    const onEnd = () => finish(() => resolve(''))
    const onError = (error: Error) => finish(() => reject(error))
    const finish = (settle: () => void) => {
      input.off('data', onData)
      input.off('end', onEnd)
      input.off('error', onError)
      input.pause()
      settle()
    }
    input.on('data', onData)
    input.on('end', onEnd)
    input.on('error', onError)
  })
}
