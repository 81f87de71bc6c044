import { afterEach, beforeEach, describe, expect, it } from '@jest/globals'
import { promises as fs } from 'node:fs'
import os from 'os'
import path from 'path'
import { GcodeWriter, GcodeWriteError } from '../src/writer/base'

describe('GcodeWriter', () => {
  const writer = new GcodeWriter()
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swiss-cheese-writer-'))
  })

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true })
  })

  it('should join lines verbatim', () => {
    expect(writer.format(['G28\n', 'M84'])).toBe('G28\nM84')
  })

  it('should create the output folder and write the file', async () => {
    const outputPath = path.join(tmpDir, 'nested', 'out.gcode')
    const written = await writer.write(['G28\n', '; done\n'], outputPath)

    expect(written).toBe('G28\n; done\n')
    expect(await fs.readFile(outputPath, 'utf8')).toBe('G28\n; done\n')
  })

  it('should wrap write failures', async () => {
    // A directory cannot be overwritten by a file.
    await expect(writer.write(['G28\n'], tmpDir)).rejects.toThrow(GcodeWriteError)
  })
})
