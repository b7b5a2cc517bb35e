/**
 * Complex amplitudes for the two-level state vectors used in measurement.
 */

export interface Complex {
  real: number;
  imag: number;
}

export function complex(real: number, imag: number = 0): Complex {
  return { real, imag };
}

export const ZERO: Complex = { real: 0, imag: 0 };

export const ONE: Complex = { real: 1, imag: 0 };

/**
 * |z|², the Born-rule weight of an amplitude
 */
export function magnitudeSquared(c: Complex): number {
  return c.real * c.real + c.imag * c.imag;
}

export function conjugate(c: Complex): Complex {
  return { real: c.real, imag: -c.imag };
}

export function add(a: Complex, b: Complex): Complex {
  return { real: a.real + b.real, imag: a.imag + b.imag };
}

export function subtract(a: Complex, b: Complex): Complex {
  return { real: a.real - b.real, imag: a.imag - b.imag };
}

/**
 * (a1*a2 - b1*b2) + (a1*b2 + a2*b1)i
 */
export function multiply(a: Complex, b: Complex): Complex {
  return {
    real: a.real * b.real - a.imag * b.imag,
    imag: a.real * b.imag + a.imag * b.real,
  };
}

export function scale(c: Complex, s: number): Complex {
  return { real: c.real * s, imag: c.imag * s };
}

export function equals(a: Complex, b: Complex, tolerance: number = 1e-10): boolean {
  return Math.abs(a.real - b.real) < tolerance && Math.abs(a.imag - b.imag) < tolerance;
}

/**
 * <a|b> = Σ conj(a_i) * b_i
 */
export function innerProduct(a: readonly Complex[], b: readonly Complex[]): Complex {
  if (a.length !== b.length) {
    throw new Error('Vectors must have same length');
  }
  return a.reduce((sum, ai, i) => add(sum, multiply(conjugate(ai), b[i])), ZERO);
}
