import { assertSuccess } from '../process.js'
import type { BuildConfig, CommandExecutor } from '../types.js'

export interface CommandSpec {
  command: string
  args: string[]
}

export function toolRequirement(build: BuildConfig): string {
  return build.toolVersion ? `${build.tool}==${build.toolVersion}` : build.tool
}

export function installCommands(build: BuildConfig): CommandSpec[] {
  return [
    { command: build.python, args: ['-m', 'pip', 'install', '--upgrade', 'pip'] },
    { command: build.python, args: ['-m', 'pip', 'install', '--upgrade', toolRequirement(build)] }
  ]
}

// Upgrades pip, then installs or upgrades the packaging tool. Stops at the first failure.
export async function ensurePackagingToolAvailable(
  build: BuildConfig,
  exec: CommandExecutor,
  verbose: boolean = false
): Promise<void> {
  for (const { command, args } of installCommands(build)) {
    const result = await exec(command, args, { cwd: build.cwd, verbose })
    assertSuccess(command, args, result)
  }
}
