import { Point, Vector } from './base'

// A linear move with XY coordinates, and Z where the line carries one.
export type Move = {
  x: number
  y: number
  z?: number
}

export type MoveParseResult = { kind: 'move'; move: Move } | { kind: 'none' }

// A single letter-addressed word of a G-code line, e.g. `X10.5`.
export type GcodeWord = {
  letter: string
  text: string
}

// An infinite line through the model, used to carve one hole.
export type CuttingLine = {
  origin: Point
  direction: Vector
}
