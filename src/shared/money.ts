// Currency helpers used across the calculation domain.
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function roundRate(value: number): number {
  return Math.round((value + Number.EPSILON) * 10000) / 10000;
}

export function sumCurrency(values: number[]): number {
  return roundCurrency(values.reduce((sum, value) => sum + value, 0));
}
