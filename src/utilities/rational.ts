function gcd(a: number, b: number): number {
    a = Math.abs(a);
    b = Math.abs(b);
    while (b !== 0) {
        const t = a % b;
        a = b;
        b = t;
    }
    return a;
}

/** a / b truncated toward zero, for integers, without a floating point division */
export function truncDiv(a: number, b: number): number {
    return (a - a % b) / b;
}

function checkSafe(value: number, what: string): number {
    if (!Number.isSafeInteger(value)) {
        throw new RangeError(`Rational ${what} ${value} is not a safe integer`);
    }
    return value;
}

/**
 * Exact fraction over safe integers, kept reduced with a positive
 * denominator. Scale factors are composed with it so that no rounding
 * happens before the final truncation.
 */
export class Rational {
    public readonly numer: number;
    public readonly denom: number;

    private constructor(numer: number, denom: number) {
        this.numer = numer;
        this.denom = denom;

        Object.freeze(this);
    }

    public static of(numer: number, denom = 1): Rational {
        checkSafe(numer, 'numerator');
        checkSafe(denom, 'denominator');
        if (denom === 0) {
            throw new RangeError('Rational with zero denominator');
        }

        const g = gcd(numer, denom);
        const sign = denom < 0 ? -1 : 1;
        // `+ 0` turns -0 into 0
        return new Rational(sign * numer / g + 0, sign * denom / g);
    }

    public static readonly ONE = Rational.of(1);

    public mul(other: Rational | number): Rational {
        const o = toRational(other);
        // cross-reduce first so the products stay small
        const g1 = gcd(this.numer, o.denom) || 1;
        const g2 = gcd(o.numer, this.denom) || 1;
        return Rational.of(
            checkSafe((this.numer / g1) * (o.numer / g2), 'product'),
            checkSafe((this.denom / g2) * (o.denom / g1), 'product'));
    }

    public div(other: Rational | number): Rational {
        const o = toRational(other);
        if (o.numer === 0) {
            throw new RangeError('Rational division by zero');
        }
        return this.mul(Rational.of(o.denom, o.numer));
    }

    public add(other: Rational | number): Rational {
        const o = toRational(other);
        const g = gcd(this.denom, o.denom);
        const denom = checkSafe((this.denom / g) * o.denom, 'sum');
        const numer = checkSafe(this.numer * (o.denom / g) + o.numer * (this.denom / g), 'sum');
        return Rational.of(numer, denom);
    }

    public sub(other: Rational | number): Rational {
        const o = toRational(other);
        return this.add(Rational.of(-o.numer, o.denom));
    }

    /** Truncated toward zero, without a floating point division */
    public toInteger(): number {
        return truncDiv(this.numer, this.denom);
    }

    /** Smallest integer not less than the value */
    public ceil(): number {
        const t = this.toInteger();
        return (this.numer > 0 && this.numer % this.denom !== 0) ? t + 1 : t;
    }

    public equals(other: Rational | number): boolean {
        const o = toRational(other);
        return this.numer === o.numer && this.denom === o.denom;
    }

    public compare(other: Rational | number): number {
        const diff = this.sub(other);
        return Math.sign(diff.numer);
    }

    public toString(): string {
        return this.denom === 1 ? `${this.numer}` : `${this.numer}/${this.denom}`;
    }
}

function toRational(value: Rational | number): Rational {
    return value instanceof Rational ? value : Rational.of(value);
}
