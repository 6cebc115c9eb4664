import { assertUnreachable, InvalidArgumentError } from "./util";

const NUMBER_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

export type DecimalLike = Decimal | number | bigint | string;

/**
 * Exact decimal number, `unscaled * 10^-scale`.
 *
 * Values are kept normalised (no trailing fractional zeros, `scale >= 0`),
 * so equal values always share one string form.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);

  private constructor(
    public readonly unscaled: bigint,
    public readonly scale: number
  ) {}

  static of(unscaled: bigint, scale = 0): Decimal {
    if (scale < 0) {
      return new Decimal(unscaled * 10n ** BigInt(-scale), 0);
    }
    if (unscaled === 0n) return Decimal.ZERO;
    while (scale > 0 && unscaled % 10n === 0n) {
      unscaled /= 10n;
      scale--;
    }
    return new Decimal(unscaled, scale);
  }

  static from(value: DecimalLike): Decimal {
    if (value instanceof Decimal) return value;
    switch (typeof value) {
      case "bigint":
        return Decimal.of(value);
      case "number":
        return Decimal.fromNumber(value);
      case "string":
        return Decimal.parse(value);
      // istanbul ignore next
      default:
        return assertUnreachable(value);
    }
  }

  /**
   * Parses `"12"`, `"-0.5"`, `".5"`, `"5."` and exponent forms such as
   * `"1e-7"`.
   */
  static parse(text: string): Decimal {
    const match = NUMBER_PATTERN.exec(text.trim());
    if (!match) {
      throw new InvalidArgumentError(`Not a decimal number: "${text}"`);
    }
    const [, sign, intPart, fracPart = "", exponent] = match;
    if (!intPart && !fracPart) {
      throw new InvalidArgumentError(`Not a decimal number: "${text}"`);
    }
    const digits = BigInt(`${intPart}${fracPart}` || "0");
    const scale = fracPart.length - (exponent ? Number(exponent) : 0);
    return Decimal.of(sign === "-" ? -digits : digits, scale);
  }

  static fromNumber(value: number): Decimal {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(`Not a finite number: ${value}`);
    }
    return Decimal.parse(String(value));
  }

  static compare(left: Decimal, right: Decimal): number {
    return left.compare(right);
  }

  add(other: DecimalLike): Decimal {
    const o = Decimal.from(other);
    const [l, r] = align(this, o);
    return Decimal.of(l + r, Math.max(this.scale, o.scale));
  }

  sub(other: DecimalLike): Decimal {
    return this.add(Decimal.from(other).negate());
  }

  mul(other: DecimalLike): Decimal {
    const o = Decimal.from(other);
    return Decimal.of(this.unscaled * o.unscaled, this.scale + o.scale);
  }

  negate(): Decimal {
    return Decimal.of(-this.unscaled, this.scale);
  }

  abs(): Decimal {
    return this.unscaled < 0n ? this.negate() : this;
  }

  /** Exact `floor(this / divisor)`. */
  floorDiv(divisor: DecimalLike): bigint {
    const d = Decimal.from(divisor);
    if (d.isZero()) {
      throw new InvalidArgumentError("Division by zero");
    }
    const [l, r] = align(this, d);
    const quotient = l / r;
    if (l % r !== 0n && (l < 0n) !== (r < 0n)) {
      return quotient - 1n;
    }
    return quotient;
  }

  isMultipleOf(divisor: DecimalLike): boolean {
    const d = Decimal.from(divisor);
    if (d.isZero()) return this.isZero();
    const [l, r] = align(this, d);
    return l % r === 0n;
  }

  compare(other: DecimalLike): -1 | 0 | 1 {
    const [l, r] = align(this, Decimal.from(other));
    return l < r ? -1 : l > r ? 1 : 0;
  }

  equals(other: DecimalLike): boolean {
    return this.compare(other) === 0;
  }

  lt(other: DecimalLike): boolean {
    return this.compare(other) < 0;
  }

  lte(other: DecimalLike): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: DecimalLike): boolean {
    return this.compare(other) > 0;
  }

  gte(other: DecimalLike): boolean {
    return this.compare(other) >= 0;
  }

  isZero(): boolean {
    return this.unscaled === 0n;
  }

  sign(): -1 | 0 | 1 {
    return this.unscaled < 0n ? -1 : this.unscaled > 0n ? 1 : 0;
  }

  isInteger(): boolean {
    return this.scale === 0;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    if (this.scale === 0) return this.unscaled.toString();

    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled)
      .toString()
      .padStart(this.scale + 1, "0");
    const intPart = digits.slice(0, digits.length - this.scale);
    const fracPart = digits.slice(digits.length - this.scale);
    return `${negative ? "-" : ""}${intPart}.${fracPart}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

function align(left: Decimal, right: Decimal): [bigint, bigint] {
  const scale = Math.max(left.scale, right.scale);
  return [
    left.unscaled * 10n ** BigInt(scale - left.scale),
    right.unscaled * 10n ** BigInt(scale - right.scale),
  ];
}
