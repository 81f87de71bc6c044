import { describe, expect, it } from '@jest/globals'
import path from 'path'
import { GcodeReader, GcodeReadError } from '../src/reader/base'

const dataDir = path.join(__dirname, 'data')

describe('GcodeReader', () => {
  const reader = new GcodeReader()

  describe('readString', () => {
    it('should keep the newline on every line', () => {
      expect(reader.readString('G28\nG1 X1 Y1 E1\n')).toEqual(['G28\n', 'G1 X1 Y1 E1\n'])
    })

    it('should keep a final line without a newline', () => {
      expect(reader.readString('G28\nM84')).toEqual(['G28\n', 'M84'])
    })

    it('should read CRLF and CR line endings as LF', () => {
      expect(reader.readString('G28\r\n\r\nM84\r\n')).toEqual(['G28\n', '\n', 'M84\n'])
      expect(reader.readString('G28\rM84')).toEqual(['G28\n', 'M84'])
    })

    it('should return no lines for empty text', () => {
      expect(reader.readString('')).toEqual([])
    })
  })

  describe('readFile', () => {
    it('should read single_point.gcode', async () => {
      const lines = await reader.readFile(path.join(dataDir, 'single_point.gcode'))
      expect(lines).toEqual(['; single extrusion\n', 'G1 X10.0 Y10.0 E0.05\n', 'G1 X10.0 Y10.0\n'])
    })

    it('should read every line of square.gcode', async () => {
      const lines = await reader.readFile(path.join(dataDir, 'square.gcode'))
      expect(lines).toHaveLength(30)
      expect(lines[0]).toBe(';FLAVOR:Marlin\n')
      expect(lines[29]).toBe('M84\n')
    })

    it('should wrap a missing file in a read error', async () => {
      const missing = path.join(dataDir, 'missing.gcode')
      await expect(reader.readFile(missing)).rejects.toThrow(GcodeReadError)
      await expect(reader.readFile(missing)).rejects.toThrow(
        `Failed to read G-code file ${missing}`
      )
    })
  })
})
