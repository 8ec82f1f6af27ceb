import { parseEnv } from '@standalone-packager/config'
import { resolveBuildConfig } from '../config.js'
import type { BuildConfig, CommandResult } from '../types.js'

export function makeBuild(overrides: Partial<BuildConfig> = {}): BuildConfig {
  return resolveBuildConfig({ cwd: '/project', python: 'python', pause: false, ...overrides }, parseEnv({}))
}

export function result(code: number | null, stdout = '', stderr = ''): CommandResult {
  return { code, signal: null, stdout, stderr }
}
