import { z } from 'zod'
import { DEFAULT_HOLE_OPTIONS, HoleOptions } from '../types/options'

// Plain base-10 digits only; `Number()` alone would also take `0x10`, `1e2` and `Infinity`.
const INTEGER_PATTERN = /^[-+]?\d+$/

export const holeCountSchema = z
  .string()
  .regex(INTEGER_PATTERN, 'Hole count must be a whole number')
  .pipe(z.coerce.number().nonnegative('Hole count cannot be negative'))

export const radiusSchema = z.coerce
  .number()
  .finite('Radius must be a finite number')
  .nonnegative('Radius cannot be negative')

export const seedSchema = z
  .string()
  .regex(INTEGER_PATTERN, 'Seed must be a whole number')
  .pipe(z.coerce.number().refine(Number.isSafeInteger, 'Seed is out of range'))

// Any schema that turns the raw text into a number.
export type NumericOptionSchema = z.ZodType<number, z.ZodTypeDef, unknown>

export type OptionParseOutcome = {
  value: number
  notice?: string // Set when the input was rejected and the fallback used.
}

// Empty input silently takes the fallback; invalid input takes it with a notice.
export function parseNumericOption(
  raw: string | undefined,
  schema: NumericOptionSchema,
  fallback: number
): OptionParseOutcome {
  const trimmed = raw?.trim() ?? ''
  if (trimmed === '') {
    return { value: fallback }
  }

  const result = schema.safeParse(trimmed)
  if (result.success) {
    return { value: result.data }
  }

  const reason = result.error.issues.length > 0 ? result.error.issues[0].message : 'Invalid value'
  return {
    value: fallback,
    notice: `Invalid input "${trimmed}" (${reason}), using default ${fallback}.`
  }
}

export type RawHoleOptions = {
  holes?: string
  radius?: string
  seed?: string
}

export function resolveHoleOptions(
  raw: RawHoleOptions,
  log: (message: string) => void = console.log
): HoleOptions {
  const outcomes = {
    holeCount: parseNumericOption(raw.holes, holeCountSchema, DEFAULT_HOLE_OPTIONS.holeCount),
    radius: parseNumericOption(raw.radius, radiusSchema, DEFAULT_HOLE_OPTIONS.radius),
    seed: parseNumericOption(raw.seed, seedSchema, DEFAULT_HOLE_OPTIONS.seed)
  }

  for (const outcome of Object.values(outcomes)) {
    if (outcome.notice) log(outcome.notice)
  }

  return {
    holeCount: outcomes.holeCount.value,
    radius: outcomes.radius.value,
    seed: outcomes.seed.value
  }
}
