// Index functions for the bloom set. Elements are bytes, so every
// intermediate stays far below 2 ** 53.
export enum Hash {
  H1,
  H2,
  H3,
}

export const HASHES: readonly Hash[] = [Hash.H1, Hash.H2, Hash.H3];

const FORMULAS: Record<Hash, string> = {
  [Hash.H1]: "H1(x mod M)",
  [Hash.H2]: "H2(2x + 3 mod M)",
  [Hash.H3]: "H3(8x mod M)",
};

/** Maps `element` to an index in `[0, m)`; `m` must be a positive integer. */
export function hash(variant: Hash, element: number, m: number): number {
  switch (variant) {
    case Hash.H1:
      return element % m;
    case Hash.H2:
      return (2 * element + 3) % m;
    case Hash.H3:
      return (8 * element) % m;
  }
}

export function formula(variant: Hash): string {
  return FORMULAS[variant];
}

export function indices(element: number, m: number): number[] {
  return HASHES.map((variant) => hash(variant, element, m));
}
