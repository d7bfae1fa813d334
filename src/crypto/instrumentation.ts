/**
 * Process-wide count of key derivations actually performed. Cache hits do
 * not count. Tests read it to prove how often keys were derived.
 */
export class DerivationCounter {
  #count = 0;

  get value(): number {
    return this.#count;
  }

  increment(): number {
    this.#count += 1;
    return this.#count;
  }

  reset(): void {
    this.#count = 0;
  }
}

export const derivationCounter = new DerivationCounter();
