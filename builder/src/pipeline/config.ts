import path from 'path'
import { env, parseDataDirs } from '@standalone-packager/config'
import type { Env } from '@standalone-packager/config'
import { cleanPriorArtifacts } from './steps/clean.js'
import { ensurePackagingToolAvailable, toolRequirement } from './steps/ensure-tool.js'
import { invokePackagingTool } from './steps/package.js'
import { formatSize, verifyArtifact } from './steps/verify.js'
import type { BuildConfig, PipelineConfig } from './types.js'

// Anything left undefined falls back to the environment, then to the defaults in @standalone-packager/config
export function resolveBuildConfig(overrides: Partial<BuildConfig> = {}, source: Env = env): BuildConfig {
  return {
    cwd: path.resolve(overrides.cwd ?? process.cwd()),
    script: overrides.script ?? source.PACKAGER_SCRIPT,
    outputFilename: overrides.outputFilename ?? source.PACKAGER_OUTPUT_FILENAME,
    outputDir: overrides.outputDir ?? source.PACKAGER_OUTPUT_DIR,
    dataDirs: overrides.dataDirs ?? parseDataDirs(source.PACKAGER_DATA_DIRS),
    icon: overrides.icon ?? source.PACKAGER_ICON,
    python: overrides.python ?? source.PACKAGER_PYTHON,
    tool: overrides.tool ?? source.PACKAGER_TOOL,
    toolVersion: overrides.toolVersion ?? source.PACKAGER_TOOL_VERSION,
    strictExitCode: overrides.strictExitCode ?? source.PACKAGER_STRICT_EXIT,
    pause: overrides.pause ?? source.PACKAGER_PAUSE
  }
}

export function createPipelineConfig(build: BuildConfig): PipelineConfig {
  const relative = (target: string) => path.relative(build.cwd, target) || '.'

  return {
    build,
    steps: [
      {
        id: 'clean',
        name: 'Clean previous build output',
        description: 'Remove the build-intermediate and distribution directories',
        run: async ({ build }) => {
          const removed = await cleanPriorArtifacts(build)
          return removed.length > 0 ? `Removed ${removed.map(relative).join(', ')}` : 'Nothing to clean'
        }
      },
      {
        id: 'ensure-tool',
        name: 'Install packaging tool',
        description: 'Upgrade pip and install the latest (or pinned) packaging tool',
        run: async ({ build, exec, verbose }) => {
          await ensurePackagingToolAvailable(build, exec, verbose)
          return `${toolRequirement(build)} is up to date`
        }
      },
      {
        id: 'package',
        name: 'Package executable',
        description: 'Compile the script into a standalone executable',
        dependencies: ['clean'],
        allowFailure: !build.strictExitCode,
        run: async ({ build, exec, verbose }) => {
          await invokePackagingTool(build, exec, verbose)
          return `Packaged ${build.script}`
        }
      },
      {
        id: 'verify',
        name: 'Verify executable',
        description: 'Check that the packaged executable was written',
        dependencies: ['package'],
        allowFailure: !build.strictExitCode,
        run: async ({ build }) => {
          const artifact = verifyArtifact(build)
          return `📦 ${relative(artifact.path)} (${formatSize(artifact.sizeBytes)})`
        }
      }
    ]
  }
}
