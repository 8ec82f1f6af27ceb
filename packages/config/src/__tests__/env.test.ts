import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { parseEnv } from '../index.js'

describe('parseEnv', () => {
  it('falls back to the packaging defaults', () => {
    const parsed = parseEnv({})

    expect(parsed.PACKAGER_SCRIPT).toBe('main.py')
    expect(parsed.PACKAGER_OUTPUT_FILENAME).toBe('App.exe')
    expect(parsed.PACKAGER_OUTPUT_DIR).toBe('dist')
    expect(parsed.PACKAGER_DATA_DIRS).toBe('Files=Files')
    expect(parsed.PACKAGER_ICON).toBe('Files/Icon.ico')
    expect(parsed.PACKAGER_TOOL).toBe('nuitka')
    expect(parsed.PACKAGER_TOOL_VERSION).toBeUndefined()
    expect(parsed.PACKAGER_STRICT_EXIT).toBe(true)
    expect(parsed.PACKAGER_PAUSE).toBe(true)
  })

  it('reads overrides and boolean flags', () => {
    const parsed = parseEnv({
      PACKAGER_SCRIPT: 'launcher.py',
      PACKAGER_TOOL_VERSION: '2.4.8',
      PACKAGER_STRICT_EXIT: 'false',
      PACKAGER_PAUSE: 'false',
    })

    expect(parsed.PACKAGER_SCRIPT).toBe('launcher.py')
    expect(parsed.PACKAGER_TOOL_VERSION).toBe('2.4.8')
    expect(parsed.PACKAGER_STRICT_EXIT).toBe(false)
    expect(parsed.PACKAGER_PAUSE).toBe(false)
  })

  it('rejects a flag that is not true or false', () => {
    expect(() => parseEnv({ PACKAGER_PAUSE: 'yes' })).toThrow(ZodError)
  })
})
