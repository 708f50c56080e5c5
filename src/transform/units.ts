/**
 * Unit conversion tables.
 * Every unit is expressed as a factor of its dimension's base unit.
 */

export type Dimension = 'count' | 'energy' | 'frequency' | 'length' | 'mass' | 'time' | 'vo2';

// Values are rounded after conversion so that the same quantity written in
// two units normalizes to the same number.
const CONVERSION_DECIMALS = 6;

const UNIT_FACTORS: Record<Dimension, Readonly<Record<string, number>>> = {
  count: {
    count: 1,
  },
  // base: joule
  energy: {
    Cal: 4184,
    cal: 4.184,
    J: 1,
    kcal: 4184,
    kJ: 1000,
  },
  // base: count per minute
  frequency: {
    'beats/min': 1,
    bpm: 1,
    'count/min': 1,
    'count/s': 60,
    Hz: 60,
  },
  // base: meter
  length: {
    cm: 0.01,
    ft: 0.3048,
    in: 0.0254,
    km: 1000,
    m: 1,
    mi: 1609.344,
    mm: 0.001,
    yd: 0.9144,
  },
  // base: kilogram
  mass: {
    g: 0.001,
    kg: 1,
    lb: 0.453_592_37,
    oz: 0.028_349_523_125,
    st: 6.350_293_18,
  },
  // base: second
  time: {
    d: 86_400,
    h: 3600,
    hr: 3600,
    min: 60,
    ms: 0.001,
    s: 1,
  },
  // base: mL/(kg·min)
  vo2: {
    'mL/(kg·min)': 1,
    'mL/min·kg': 1,
    'ml/(kg·min)': 1,
    'ml/kg/min': 1,
  },
};

export function isKnownUnit(dimension: Dimension, unit: string): boolean {
  return Object.hasOwn(UNIT_FACTORS[dimension], unit);
}

export function listUnits(dimension: Dimension): string[] {
  return Object.keys(UNIT_FACTORS[dimension]);
}

/**
 * Convert a value between two units of the same dimension.
 * Returns undefined when either unit is not part of the dimension.
 */
export function convertUnit(
  value: number,
  from: string,
  to: string,
  dimension: Dimension,
): number | undefined {
  const factors = UNIT_FACTORS[dimension];
  if (!Object.hasOwn(factors, from) || !Object.hasOwn(factors, to)) return undefined;
  if (from === to) return roundTo(value, CONVERSION_DECIMALS);

  return roundTo((value * factors[from]) / factors[to], CONVERSION_DECIMALS);
}

/**
 * Round a number to specified decimal places.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
