export function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
* Trailing simple moving average. Position `i` averages `values[i - period + 1 .. i]` and is
* `null` until `period` finite samples are available (or when any sample in the window is missing).
*/
export function sma(values: ReadonlyArray<number | null>, period: number): Array<number | null> {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error(`SMA period must be a positive integer, got ${period}`);
  }

  // No running sum: every window is summed from scratch, so identical windows always produce
  // identical averages. O(n * period); periods and lookbacks are small.
  const out: Array<number | null> = new Array(values.length).fill(null);
  for (let i = period - 1; i < values.length; i += 1) {
    let sum = 0;
    let count = 0;

    for (let j = i - period + 1; j <= i; j += 1) {
      const v = values[j];
      if (!isFiniteNumber(v)) {
        continue;
      }
      count += 1;
      sum += v;
    }

    out[i] = count === period ? sum / period : null;
  }

  return out;
}

/**
* Value at `index`, counting from the end when negative (`-1` is the last element).
*/
export function valueAt(values: ReadonlyArray<number | null>, index: number): number | null {
  const v = values[index < 0 ? values.length + index : index];
  return isFiniteNumber(v) ? v : null;
}

/**
* Rounds half away from zero to `digits` decimals.
*
* The scaled value is nudged by one epsilon before rounding so that decimal ties that are not
* exactly representable (1.005, 2.675, ...) still round away from zero.
*/
export function roundHalfAwayFromZero(value: number, digits: number): number {
  if (!Number.isInteger(digits) || digits < 0) {
    throw new Error(`digits must be a non-negative integer, got ${digits}`);
  }
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot round non-finite value: ${value}`);
  }

  const factor = 10 ** digits;
  const rounded = Math.round(Math.abs(value) * factor * (1 + Number.EPSILON)) / factor;
  if (rounded === 0) {
    return 0;
  }

  return value < 0 ? -rounded : rounded;
}

/**
* Percent change of `current` relative to `reference`: `(current / reference - 1) * 100`.
*/
export function pctChange(current: number, reference: number): number | null {
  if (!isFiniteNumber(current) || !isFiniteNumber(reference) || reference === 0) {
    return null;
  }

  return (current / reference - 1) * 100;
}
