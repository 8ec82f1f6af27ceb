import { spawn } from 'child_process'
import { CommandFailedError } from './errors.js'
import type { CommandOptions, CommandResult } from './types.js'

const OUTPUT_TAIL_LINES = 20

export function runCommand(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: options.verbose ? 'inherit' : ['inherit', 'pipe', 'pipe'],
      cwd: options.cwd
    })

    let stdout = ''
    let stderr = ''

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ code, signal, stdout, stderr })
    })

    child.on('error', (error: Error) => {
      reject(new CommandFailedError(command, args, null, null, undefined, { cause: error }))
    })
  })
}

// Last lines of captured output, stderr first since that is where pip and nuitka report problems
export function outputTail(result: CommandResult, lines: number = OUTPUT_TAIL_LINES): string {
  const text = [result.stderr, result.stdout]
    .map(stream => stream.trimEnd())
    .filter(stream => stream.length > 0)
    .join('\n')
  return text.split('\n').slice(-lines).join('\n')
}

export function assertSuccess(command: string, args: string[], result: CommandResult): CommandResult {
  if (result.code !== 0) {
    const tail = outputTail(result)
    throw new CommandFailedError(command, args, result.code, result.signal, tail || undefined)
  }
  return result
}
