import { defineCommand, runCommand } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { installCommand } from './commands/install.js'
import { createLogger } from './installers/logger.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
)

export const root = defineCommand({
  ...installCommand,
  meta: {
    name: 'tmux-setup',
    version: packageJson.version,
    description: 'Install the tmux configuration bundle, TPM and its plugins'
  }
})

/**
 * Runs the root command with every token going through the install flag
 * parser; citty's `runMain` would answer --help and --version on its own.
 */
export async function runCli(rawArgs: string[]): Promise<number> {
  try {
    const { result } = await runCommand(root, { rawArgs })
    return typeof result === 'number' ? result : 0
  } catch (error) {
    createLogger().err(error instanceof Error ? error.message : String(error))
    return 1
  }
}
