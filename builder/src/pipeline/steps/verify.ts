import fs from 'node:fs'
import { getArtifactPaths } from '@standalone-packager/config'
import { ArtifactMissingError } from '../errors.js'
import type { BuildConfig } from '../types.js'

export interface ArtifactInfo {
  path: string
  sizeBytes: number
}

export function verifyArtifact(build: BuildConfig): ArtifactInfo {
  const { executable } = getArtifactPaths(build.cwd, build.script, build.outputDir, build.outputFilename)

  if (!fs.existsSync(executable)) {
    throw new ArtifactMissingError(executable)
  }

  return { path: executable, sizeBytes: fs.statSync(executable).size }
}

export function formatSize(sizeBytes: number): string {
  return `${(sizeBytes / (1024 * 1024)).toFixed(2)} MB`
}
