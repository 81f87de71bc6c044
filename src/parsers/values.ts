import { ParseError } from './exceptions'

// Optionally signed decimal, with or without a fractional part: `10`, `-3.5`, `.25`, `+7.`
const DECIMAL_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)$/

export function isDecimal(value: string): boolean {
  return DECIMAL_PATTERN.test(value)
}

export function parseDecimal(value: string | undefined, name: string): number {
  if (!value) {
    throw new ParseError(`Missing ${name} value`)
  }
  if (!isDecimal(value)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return parseFloat(value)
}
