import { animatableEquals } from '../timeline/equality.js';
import { hashAnimatable, type SequenceHashMode } from '../timeline/hash.js';
import type { Animatable, ValueTraits } from '../timeline/types.js';

type CanonicalEntry<T> = {
  readonly key: Animatable<T>;
  readonly canonical: Animatable<T>;
};

/**
 * Insert-only memo from a timeline to its canonical form, keyed by structural
 * equality. Entries live as long as the table.
 */
export class CanonicalTable<T> {
  readonly traits: ValueTraits<T>;
  readonly hashMode: SequenceHashMode;
  private readonly buckets = new Map<number, CanonicalEntry<T>[]>();
  private entryCount = 0;

  constructor(traits: ValueTraits<T>, hashMode: SequenceHashMode = 'ordered') {
    this.traits = traits;
    this.hashMode = hashMode;
  }

  get size(): number {
    return this.entryCount;
  }

  hashOf(value: Animatable<T>): number {
    return hashAnimatable(value, this.traits, this.hashMode);
  }

  lookup(value: Animatable<T>): Animatable<T> | undefined {
    const bucket = this.buckets.get(this.hashOf(value));
    return bucket?.find((entry) => animatableEquals(entry.key, value, this.traits))?.canonical;
  }

  /** Returns the canonical form already stored for `key`, or stores `canonical`. */
  insert(key: Animatable<T>, canonical: Animatable<T>): Animatable<T> {
    const hash = this.hashOf(key);
    const bucket = this.buckets.get(hash);
    const existing = bucket?.find((entry) => animatableEquals(entry.key, key, this.traits));
    if (existing) {
      return existing.canonical;
    }
    const entry = { key, canonical };
    if (bucket) {
      bucket.push(entry);
    } else {
      this.buckets.set(hash, [entry]);
    }
    this.entryCount++;
    return canonical;
  }
}
