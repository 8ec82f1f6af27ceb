import path from 'path'

export const PATHS = {
  // Source and bundled resources, relative to the project being packaged
  script: 'main.py',
  dataDir: 'Files',
  icon: 'Files/Icon.ico',

  // Packaging output
  outputDir: 'dist',
  outputFilename: 'App.exe',
} as const

export interface DataDirMapping {
  source: string
  target: string
}

export interface ArtifactPaths {
  buildDir: string
  distDir: string
  standaloneDir: string
  executable: string
}

// "main.py" -> "main"
export const scriptStem = (script: string): string => {
  return path.basename(script, path.extname(script))
}

// Helper function to resolve paths relative to the project root
export const resolvePath = (root: string, relativePath: string): string => {
  return path.resolve(root, relativePath)
}

export const getArtifactPaths = (
  root: string,
  script: string,
  outputDir: string,
  outputFilename: string
): ArtifactPaths => {
  const stem = scriptStem(script)
  const distDir = resolvePath(root, outputDir)
  const standaloneDir = path.join(distDir, `${stem}.dist`)

  return {
    buildDir: resolvePath(root, `${stem}.build`),
    distDir,
    standaloneDir,
    executable: path.join(standaloneDir, outputFilename),
  }
}

/**
 * Parses "src=dst,other=other" into data directory mappings.
 * An entry without "=" maps the directory onto the same relative path.
 */
export const parseDataDirs = (value: string): DataDirMapping[] => {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const separator = entry.indexOf('=')
      if (separator === -1) {
        return { source: entry, target: entry }
      }
      const source = entry.slice(0, separator).trim()
      const target = entry.slice(separator + 1).trim()
      if (!source || !target) {
        throw new Error(`Invalid data dir mapping "${entry}", expected <source>=<target>`)
      }
      return { source, target }
    })
}
