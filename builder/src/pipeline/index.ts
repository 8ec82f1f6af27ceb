#!/usr/bin/env tsx
import 'dotenv/config'
import { existsSync, realpathSync } from 'fs'
import path from 'path'
import { pathToFileURL } from 'url'
import { Command } from 'commander'
import chalk from 'chalk'
import { parseDataDirs } from '@standalone-packager/config'
import { createPipelineConfig, resolveBuildConfig } from './config.js'
import { errorMessage } from './errors.js'
import { PipelineRunner } from './runner.js'
import { cleanPriorArtifacts } from './steps/clean.js'
import { packagingCommand } from './steps/package.js'
import type { BuildConfig } from './types.js'

interface ConfigOptions {
  cwd?: string
  script?: string
  outputFilename?: string
  outputDir?: string
  dataDir?: string[]
  icon?: string
  python?: string
  toolVersion?: string
  lenient?: boolean
  pause?: boolean
}

interface BuildOptions extends ConfigOptions {
  step?: string[]
  skip?: string[]
  verbose?: boolean
}

const list = (value: string) => value.split(',').map(v => v.trim()).filter(Boolean)
const collect = (value: string, previous: string[] = []) => [...previous, value]

function withConfigOptions(command: Command): Command {
  return command
    .option('--cwd <dir>', 'Directory to build in')
    .option('--script <file>', 'Python entry script')
    .option('--output-filename <name>', 'Name of the produced executable')
    .option('--output-dir <dir>', 'Directory for packaging output')
    .option('--data-dir <mapping>', 'Bundle a data directory as <source>=<target> (repeatable)', collect)
    .option('--icon <file>', 'Icon embedded into the executable')
    .option('--python <command>', 'Python interpreter to run pip and the packaging tool with')
    .option('--tool-version <version>', 'Pin the packaging tool instead of installing the latest release')
    .option('--lenient', 'Report completion even when packaging fails')
    .option('--no-pause', 'Do not wait for Enter after a successful build')
}

export function toBuildConfig(options: ConfigOptions): BuildConfig {
  return resolveBuildConfig({
    cwd: options.cwd,
    script: options.script,
    outputFilename: options.outputFilename,
    outputDir: options.outputDir,
    dataDirs: options.dataDir ? options.dataDir.flatMap(parseDataDirs) : undefined,
    icon: options.icon,
    python: options.python,
    toolVersion: options.toolVersion,
    // Only explicit flags override the environment
    strictExitCode: options.lenient ? false : undefined,
    pause: options.pause === false ? false : undefined
  })
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('standalone-packager')
    .description('Package a Python application into a standalone Windows executable')
    .version('1.0.0')

  withConfigOptions(
    program
      .command('build', { isDefault: true })
      .description('Clean, install the packaging tool and build the executable')
      .option('-s, --step <steps>', 'Run only specific step(s)', list)
      .option('--skip <steps>', 'Skip specific step(s)', list)
      .option('--verbose', 'Stream subprocess output')
  ).action(async (options: BuildOptions) => {
    const build = toBuildConfig(options)
    const runner = new PipelineRunner(createPipelineConfig(build), { verbose: options.verbose })
    const report = await runner.run(options.step, options.skip)

    if (!report.success) {
      console.error(chalk.red('\n❌ Build failed'))
      process.exit(1)
    }
  })

  withConfigOptions(
    program
      .command('clean')
      .description('Remove previous build output')
  ).action(async (options: ConfigOptions) => {
    const build = toBuildConfig(options)
    console.log(chalk.yellow('🧹 Cleaning build artifacts...'))

    const removed = await cleanPriorArtifacts(build)
    for (const dir of removed) {
      console.log(`   • ${path.relative(build.cwd, dir)}`)
    }
    console.log(chalk.green(removed.length > 0 ? '✅ Clean completed' : '✅ Nothing to clean'))
  })

  withConfigOptions(
    program
      .command('args')
      .description('Print the packaging command without running it')
  ).action((options: ConfigOptions) => {
    const { command, args } = packagingCommand(toBuildConfig(options))
    console.log([command, ...args].join('\n'))
  })

  return program
}

// Handle direct execution, including through the npm bin symlink
const entry = process.argv[1]
if (entry && existsSync(entry) && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(chalk.red(`❌ ${errorMessage(error)}`))
      process.exit(1)
    })
}
