export const BPS = 10_000n;

export function toBigInt(value: unknown): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new TypeError(`Cannot convert ${value} to bigint`);
    return BigInt(Math.trunc(value));
  }
  if (typeof value === 'string') {
    const s = value.trim().replace(/_/g, '');
    if (!s) throw new TypeError('Empty string cannot be converted to bigint');
    if (!/^-?\d+$/.test(s)) throw new TypeError(`Not an integer amount: ${value}`);
    return BigInt(s);
  }
  throw new TypeError(`Cannot convert type ${typeof value} to BigInt`);
}

export function bigintToDb(v: bigint): string { return v.toString(); }

export function dbToBigint(v: unknown): bigint {
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'bigint') return toBigInt(v);
  throw new TypeError(`Unexpected DB bigint type: ${typeof v}`);
}

/** floor(a * b / d) for non-negative operands. bigint arithmetic cannot overflow. */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d <= 0n) throw new RangeError('mulDiv: divisor must be positive');
  if (a < 0n || b < 0n) throw new RangeError('mulDiv: operands must be non-negative');
  return (a * b) / d;
}

/** ceil(a * b / d) for non-negative operands. */
export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  if (d <= 0n) throw new RangeError('mulDivUp: divisor must be positive');
  if (a < 0n || b < 0n) throw new RangeError('mulDivUp: operands must be non-negative');
  const p = a * b;
  return p === 0n ? 0n : (p - 1n) / d + 1n;
}

export function bps(amount: bigint, rateBps: number): bigint {
  return mulDiv(amount, BigInt(rateBps), BPS);
}

export function maxBig(a: bigint, b: bigint): bigint { return a > b ? a : b; }

export function minBig(a: bigint, b: bigint): bigint { return a < b ? a : b; }
