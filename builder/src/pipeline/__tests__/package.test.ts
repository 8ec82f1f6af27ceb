import { describe, it, expect, vi } from 'vitest'
import { CommandFailedError } from '../errors.js'
import { invokePackagingTool, packagingArgs, packagingCommand } from '../steps/package.js'
import type { CommandExecutor } from '../types.js'
import { makeBuild, result } from './fixtures.js'

describe('packagingArgs', () => {
  it('contains exactly the fixed packaging flags followed by the script', () => {
    expect(packagingArgs(makeBuild())).toEqual([
      '--standalone',
      '--windows-console-mode=disable',
      '--include-data-dir=Files=Files',
      '--windows-icon-from-ico=Files/Icon.ico',
      '--output-dir=dist',
      '--assume-yes-for-downloads',
      '--remove-output',
      '--output-filename=App.exe',
      'main.py'
    ])
  })

  it('passes the output filename and data dir mapping through literally', () => {
    const args = packagingArgs(makeBuild({ script: 'main.py', outputFilename: 'App.exe' }))

    expect(args).toContain('--output-filename=App.exe')
    expect(args).toContain('--include-data-dir=Files=Files')
  })

  it('emits one include flag per data dir mapping', () => {
    const args = packagingArgs(makeBuild({
      dataDirs: [
        { source: 'Files', target: 'Files' },
        { source: 'locales', target: 'res/locales' }
      ]
    }))

    expect(args.filter(arg => arg.startsWith('--include-data-dir='))).toEqual([
      '--include-data-dir=Files=Files',
      '--include-data-dir=locales=res/locales'
    ])
  })
})

describe('packagingCommand', () => {
  it('runs the tool as a module of the interpreter', () => {
    const { command, args } = packagingCommand(makeBuild({ python: 'py' }))

    expect(command).toBe('py')
    expect(args.slice(0, 3)).toEqual(['-m', 'nuitka', '--standalone'])
  })
})

describe('invokePackagingTool', () => {
  it('runs the packaging command in the build directory', async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue(result(0))
    const build = makeBuild()

    await invokePackagingTool(build, exec, true)

    expect(exec).toHaveBeenCalledTimes(1)
    expect(exec).toHaveBeenCalledWith('python', ['-m', 'nuitka', ...packagingArgs(build)], { cwd: build.cwd, verbose: true })
  })

  it('raises when the packaging tool exits non-zero', async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue(result(1, '', 'FATAL: icon not found'))

    const error = await invokePackagingTool(makeBuild(), exec).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(CommandFailedError)
    expect(error).toMatchObject({
      code: 'COMMAND_FAILED',
      command: 'python',
      exitCode: 1,
      details: expect.objectContaining({ output: 'FATAL: icon not found' })
    })
  })
})
