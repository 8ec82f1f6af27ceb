import chalk from 'chalk'
import ora from 'ora'
import { PipelineError, UnknownStepError, errorMessage } from './errors.js'
import { runCommand } from './process.js'
import { reportCompletion } from './steps/report.js'
import type { CompletionOptions } from './steps/report.js'
import type { BuildReport, CommandExecutor, PipelineConfig, PipelineStep } from './types.js'

export interface RunnerOptions extends CompletionOptions {
  exec?: CommandExecutor
  verbose?: boolean
  // Suppress spinner output
  silent?: boolean
}

export class PipelineRunner {
  private readonly exec: CommandExecutor
  private readonly verbose: boolean

  constructor(private readonly config: PipelineConfig, private readonly options: RunnerOptions = {}) {
    this.exec = options.exec ?? runCommand
    this.verbose = options.verbose ?? false
  }

  async run(stepsToRun?: string[], skipSteps?: string[]): Promise<BuildReport> {
    const startTime = Date.now()
    const report: BuildReport = { success: false, duration: 0, steps: [] }
    const steps = this.filterSteps(this.config.steps, stepsToRun, skipSteps)

    console.log(chalk.cyan('📦 Standalone Packager'))
    console.log(chalk.cyan('='.repeat(50)))
    console.log()

    for (const [index, step] of steps.entries()) {
      const stepStartTime = Date.now()
      const text = `Step ${index + 1}/${steps.length}: ${step.name}`
      const spinner = ora({ text, color: 'cyan', isSilent: this.options.silent })

      // Subprocess output goes straight to the console in verbose mode, so no spinner animation
      if (this.verbose) {
        spinner.info()
      } else {
        spinner.start()
      }

      try {
        const output = await step.run({ build: this.config.build, exec: this.exec, verbose: this.verbose })
        report.steps.push({
          id: step.id,
          success: true,
          duration: Date.now() - stepStartTime,
          output: output || 'Completed successfully'
        })
        spinner.succeed(chalk.green(`✅ ${step.name}`) + (output ? chalk.dim(` ${output}`) : ''))
      } catch (error) {
        const message = errorMessage(error)
        report.steps.push({
          id: step.id,
          success: false,
          duration: Date.now() - stepStartTime,
          error: message
        })

        if (step.allowFailure) {
          spinner.warn(chalk.yellow(`⚠️  ${step.name}: ${message}`))
          continue
        }

        spinner.fail(chalk.red(`❌ ${step.name}`))
        console.error(chalk.red(message))
        const output = error instanceof PipelineError ? error.details?.output : undefined
        if (typeof output === 'string') {
          console.error(chalk.dim(output))
        }

        report.duration = Date.now() - startTime
        return report
      }
    }

    report.success = true
    report.duration = Date.now() - startTime

    await reportCompletion(this.config.build, report, { interactive: this.options.interactive })

    return report
  }

  /**
   * Keeps configured order. Selected steps pull in their dependencies,
   * explicitly skipped steps stay out even when something depends on them.
   */
  filterSteps(steps: PipelineStep[], run?: string[], skip?: string[]): PipelineStep[] {
    const known = steps.map(s => s.id)
    const unknown = [...(run ?? []), ...(skip ?? [])].filter(id => !known.includes(id))
    if (unknown.length > 0) {
      throw new UnknownStepError(unknown, known)
    }

    let selected = new Set(known)

    if (run && run.length > 0) {
      selected = new Set<string>()
      const pending = [...run]
      while (pending.length > 0) {
        const id = pending.pop()
        if (id === undefined || selected.has(id)) continue
        selected.add(id)
        const step = steps.find(s => s.id === id)
        pending.push(...(step?.dependencies ?? []))
      }
    }

    for (const id of skip ?? []) {
      selected.delete(id)
    }

    return steps.filter(step => selected.has(step.id))
  }
}
