import chalk from 'chalk'
import inquirer from 'inquirer'
import type { BuildConfig, BuildReport } from '../types.js'

export interface CompletionOptions {
  // Defaults to whether stdin is a terminal
  interactive?: boolean
}

export function completionMessage(build: BuildConfig): string {
  return `Build complete! Check the ${build.outputDir} folder for ${build.outputFilename}`
}

export async function waitForAcknowledgement(): Promise<void> {
  await inquirer.prompt<{ acknowledged: string }>([
    {
      type: 'input',
      name: 'acknowledged',
      message: 'Press Enter to exit'
    }
  ])
}

export async function reportCompletion(
  build: BuildConfig,
  report: BuildReport,
  options: CompletionOptions = {}
): Promise<void> {
  console.log()
  console.log(chalk.cyan('📊 BUILD SUMMARY'))
  console.log(chalk.cyan('='.repeat(50)))

  for (const step of report.steps) {
    const status = step.success ? chalk.green('✅') : chalk.yellow('⚠️ ')
    console.log(`${status} ${step.id} (${(step.duration / 1000).toFixed(2)}s)`)
  }

  console.log(`⏱️  Execution time: ${(report.duration / 1000).toFixed(2)}s`)
  // Runs that never reached packaging (--step clean, --skip package) produced no executable
  if (report.steps.some(step => step.id === 'package')) {
    console.log(chalk.green(completionMessage(build)))
  }

  const interactive = options.interactive ?? Boolean(process.stdin.isTTY)
  if (build.pause && interactive) {
    await waitForAcknowledgement()
  }
}
