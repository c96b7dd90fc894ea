import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { setLogDir } from '../src/logging/file.js'

// Keep bridge.log writes out of the real state directory
setLogDir(mkdtempSync(join(tmpdir(), 'tg-claude-bridge-log-')))
