/**
 * Coefficient as entered by an operator: a number, or text that should parse as one
 */
export type Coefficient = number | string;

export interface ConditioningCoefficients {
  zero: Coefficient;
  multiplier: Coefficient;
  gain: Coefficient;
}

export const IDENTITY_CONDITIONING: Readonly<ConditioningCoefficients> = Object.freeze({
  zero: 0,
  multiplier: 1,
  gain: 1
});

export function parseCoefficient(input: Coefficient): number | undefined {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : undefined;
  }
  const text = input.trim();
  if (text === '') {
    return undefined;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * `(raw + zero) * multiplier * gain`, or undefined when a coefficient does not parse
 */
export function tryCondition(raw: number, coefficients: ConditioningCoefficients): number | undefined {
  const zero = parseCoefficient(coefficients.zero);
  const multiplier = parseCoefficient(coefficients.multiplier);
  const gain = parseCoefficient(coefficients.gain);
  if (zero === undefined || multiplier === undefined || gain === undefined) {
    return undefined;
  }
  return (raw + zero) * multiplier * gain;
}

/**
 * Affine-then-gain transform. Falls back to the raw value for this one
 * application when any coefficient is not numeric.
 */
export function condition(raw: number, coefficients: ConditioningCoefficients): number {
  return tryCondition(raw, coefficients) ?? raw;
}
