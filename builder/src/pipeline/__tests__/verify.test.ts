import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ArtifactMissingError } from '../errors.js'
import { formatSize, verifyArtifact } from '../steps/verify.js'
import { makeBuild } from './fixtures.js'

describe('verifyArtifact', () => {
  let cwd: string

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'packager-verify-'))
  })

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true })
  })

  it('reports the executable inside the standalone directory', () => {
    mkdirSync(join(cwd, 'dist', 'main.dist'), { recursive: true })
    writeFileSync(join(cwd, 'dist', 'main.dist', 'App.exe'), Buffer.alloc(2048))

    expect(verifyArtifact(makeBuild({ cwd }))).toEqual({
      path: join(cwd, 'dist', 'main.dist', 'App.exe'),
      sizeBytes: 2048
    })
  })

  it('raises when the executable is missing', () => {
    expect(() => verifyArtifact(makeBuild({ cwd }))).toThrow(ArtifactMissingError)
  })
})

describe('formatSize', () => {
  it('formats megabytes with two decimals', () => {
    expect(formatSize(1.5 * 1024 * 1024)).toBe('1.50 MB')
  })
})
