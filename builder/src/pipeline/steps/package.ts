import { assertSuccess } from '../process.js'
import type { BuildConfig, CommandExecutor, CommandResult } from '../types.js'

export function packagingArgs(build: BuildConfig): string[] {
  return [
    '--standalone',
    '--windows-console-mode=disable',
    ...build.dataDirs.map(({ source, target }) => `--include-data-dir=${source}=${target}`),
    `--windows-icon-from-ico=${build.icon}`,
    `--output-dir=${build.outputDir}`,
    '--assume-yes-for-downloads',
    '--remove-output',
    `--output-filename=${build.outputFilename}`,
    build.script
  ]
}

// Full command line: the tool runs as a module of the configured interpreter
export function packagingCommand(build: BuildConfig): { command: string; args: string[] } {
  return {
    command: build.python,
    args: ['-m', build.tool, ...packagingArgs(build)]
  }
}

export async function invokePackagingTool(
  build: BuildConfig,
  exec: CommandExecutor,
  verbose: boolean = false
): Promise<CommandResult> {
  const { command, args } = packagingCommand(build)
  const result = await exec(command, args, { cwd: build.cwd, verbose })
  return assertSuccess(command, args, result)
}
