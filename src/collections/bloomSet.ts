import { HASHES, hash } from "./hash.ts";

/**
 * Bloom filter over bytes: a fixed array of 0/1 flags and three hash
 * functions. Queries may give false positives, never false negatives.
 */
export class BloomSet {
  static readonly DEFAULT_SIZE = 256;
  #bits: Uint8Array;

  constructor(size: number = BloomSet.DEFAULT_SIZE) {
    if (!(size >= 1 && Number.isSafeInteger(size))) {
      throw new TypeError(`Invalid size: ${size}`);
    }
    this.#bits = new Uint8Array(size);
  }

  static withSize(size: number): BloomSet {
    return new BloomSet(size);
  }

  get size(): number {
    return this.#bits.length;
  }

  #valid(element: number): boolean {
    return element >= 0 && element <= 255 && Number.isInteger(element);
  }

  add(element: number) {
    if (!this.#valid(element)) {
      throw new TypeError(`Invalid argument: ${element}`);
    }
    for (const variant of HASHES) {
      this.#bits[hash(variant, element, this.#bits.length)] = 1;
    }
  }

  query(element: number): boolean {
    if (!this.#valid(element)) return false;
    for (const variant of HASHES) {
      if (this.#bits[hash(variant, element, this.#bits.length)] !== 1) {
        return false;
      }
    }
    return true;
  }

  *flags(): Generator<number> {
    for (const bit of this.#bits) {
      yield bit;
    }
  }

  count() {
    let count = 0;
    for (const bit of this.#bits) {
      count += bit;
    }
    return count;
  }

  isEmpty() {
    for (const bit of this.#bits) {
      if (bit > 0) return false;
    }
    return true;
  }

  toString() {
    return this.#bits.join(" ");
  }
}
