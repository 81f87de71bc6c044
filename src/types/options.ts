import { BoundingBox } from './base'
import { CuttingLine } from './gcode'

// Options that control hole injection.
export type HoleOptions = {
  holeCount: number
  radius: number // In millimetres.
  seed: number
}

export const DEFAULT_HOLE_OPTIONS: HoleOptions = {
  holeCount: 20,
  radius: 1.0,
  seed: 42
}

export type HoleInjectionResult = {
  lines: string[]
  removed: number
  bounds: BoundingBox
  cuttingLines: CuttingLine[]
}
