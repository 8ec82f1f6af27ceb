import { z } from 'zod'
import { PATHS } from './paths.js'

const flag = z.enum(['true', 'false']).transform(value => value === 'true')

const schema = z.object({
  PACKAGER_SCRIPT: z.string().min(1).default(PATHS.script),
  PACKAGER_OUTPUT_FILENAME: z.string().min(1).default(PATHS.outputFilename),
  PACKAGER_OUTPUT_DIR: z.string().min(1).default(PATHS.outputDir),
  // Comma separated <source>=<target> pairs
  PACKAGER_DATA_DIRS: z.string().min(1).default(`${PATHS.dataDir}=${PATHS.dataDir}`),
  PACKAGER_ICON: z.string().min(1).default(PATHS.icon),
  PACKAGER_PYTHON: z.string().min(1).default(process.platform === 'win32' ? 'python' : 'python3'),
  PACKAGER_TOOL: z.string().min(1).default('nuitka'),
  // Unset means always install the latest release
  PACKAGER_TOOL_VERSION: z.string().min(1).optional(),
  PACKAGER_STRICT_EXIT: flag.default('true'),
  PACKAGER_PAUSE: flag.default('true'),
})

export type Env = z.infer<typeof schema>

export const parseEnv = (source: Record<string, string | undefined>): Env => schema.parse(source)

export const env = parseEnv(process.env)

export { PATHS, resolvePath, scriptStem, getArtifactPaths, parseDataDirs } from './paths.js'
export type { ArtifactPaths, DataDirMapping } from './paths.js'
