import fs from 'node:fs'
import path from 'node:path'
import { getArtifactPaths, resolvePath } from '@standalone-packager/config'
import { UnsafeCleanError } from '../errors.js'
import type { BuildConfig } from '../types.js'

// true when target is dir itself or lies somewhere below it
function contains(dir: string, target: string): boolean {
  const relative = path.relative(dir, target)
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative))
}

// Project directory plus everything the packaging run reads
function protectedPaths(build: BuildConfig): string[] {
  return [
    build.cwd,
    resolvePath(build.cwd, build.script),
    resolvePath(build.cwd, build.icon),
    ...build.dataDirs.map(({ source }) => resolvePath(build.cwd, source))
  ]
}

export function assertSafeToRemove(build: BuildConfig, dirs: string[]): void {
  const inputs = protectedPaths(build)
  for (const dir of dirs) {
    const hit = inputs.find(input => contains(dir, input))
    if (hit !== undefined) {
      throw new UnsafeCleanError(dir, hit)
    }
  }
}

/**
 * Removes the build-intermediate directory (`<script stem>.build`) and the
 * distribution directory. Missing directories are skipped; a failed removal
 * (a locked file, for instance) is thrown to the caller. Nothing is removed
 * when either directory would take the project or one of its inputs with it.
 *
 * @returns the directories that were removed
 */
export async function cleanPriorArtifacts(build: BuildConfig): Promise<string[]> {
  const { buildDir, distDir } = getArtifactPaths(build.cwd, build.script, build.outputDir, build.outputFilename)
  const removed: string[] = []

  assertSafeToRemove(build, [buildDir, distDir])

  for (const dir of [buildDir, distDir]) {
    if (fs.existsSync(dir)) {
      await fs.promises.rm(dir, { recursive: true, force: true })
      removed.push(dir)
    }
  }

  return removed
}
