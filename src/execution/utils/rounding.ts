const EPSILON = 1e-9;

export type RoundingMode = 'nearest' | 'down';

function stepDecimals(step: number): number {
  const text = step.toString();
  if (text.includes('e-')) {
    return Number(text.split('e-')[1]);
  }
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/**
 * Strips binary noise (0.30000000000000004 -> 0.3) at the step's precision.
 */
export function normalizeToStep(value: number, step: number): number {
  return Number(value.toFixed(stepDecimals(step)));
}

export function roundToStep(value: number, step: number, mode: RoundingMode = 'nearest'): number {
  if (!(step > 0)) {
    return value;
  }
  const units = value / step;
  const rounded = mode === 'down' ? Math.floor(units + EPSILON) : Math.round(units);
  return normalizeToStep(rounded * step, step);
}

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fraction rounded to a basis point (0.0001).
 */
export function roundToBasisPoint(fraction: number): number {
  return Math.round(fraction * 10000) / 10000;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
