import type { DataDirMapping } from '@standalone-packager/config'

export interface BuildConfig {
  // Directory the build runs in; every relative path below resolves against it
  cwd: string
  script: string
  outputFilename: string
  outputDir: string
  dataDirs: DataDirMapping[]
  icon: string
  python: string
  // pip package name of the packaging tool
  tool: string
  toolVersion?: string
  // When false a failed packaging run is only a warning
  strictExitCode: boolean
  pause: boolean
}

export interface CommandResult {
  code: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
}

export interface CommandOptions {
  cwd: string
  verbose?: boolean
}

export type CommandExecutor = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>

export interface StepContext {
  build: BuildConfig
  exec: CommandExecutor
  verbose: boolean
}

export interface PipelineStep {
  id: string
  name: string
  description: string
  run: (ctx: StepContext) => Promise<string | undefined>
  dependencies?: string[]
  // Record the failure and keep going instead of stopping the pipeline
  allowFailure?: boolean
}

export interface PipelineConfig {
  build: BuildConfig
  steps: PipelineStep[]
}

export interface StepReport {
  id: string
  success: boolean
  duration: number
  output?: string
  error?: string
}

export interface BuildReport {
  success: boolean
  duration: number
  steps: StepReport[]
}
