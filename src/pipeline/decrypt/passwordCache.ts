export interface PasswordStore {
  getGroupPasswords(groupKey: string): string[];
  saveGroupPasswords(groupKey: string, passwords: string[]): void;
}

function uniqueNonEmpty(values: Iterable<string>): string[] {
  const out: string[] = [];
  for (const value of values) {
    if (value && !out.includes(value)) {
      out.push(value);
    }
  }
  return out;
}

/** Ordered candidates for one group. The confirmed password, once found, sits at index 0. */
export class CandidatePasswordSet {
  private values: string[];
  private confirmed = false;

  constructor(
    readonly groupKey: string,
    initial: Iterable<string>,
    private readonly onChange: (set: CandidatePasswordSet) => void = () => {},
  ) {
    this.values = uniqueNonEmpty(initial);
  }

  get passwords(): readonly string[] {
    return this.values;
  }

  get size(): number {
    return this.values.length;
  }

  /** Marks `password` as the group's confirmed one; the first confirmation is always persisted. */
  promote(password: string): void {
    if (this.confirmed && this.values[0] === password) {
      return;
    }
    this.confirmed = true;
    this.values = [password, ...this.values.filter((p) => p !== password)];
    this.onChange(this);
  }

  addHints(hints: Iterable<string>): void {
    const merged = uniqueNonEmpty([...this.values, ...hints]);
    if (merged.length === this.values.length) {
      return;
    }
    this.values = merged;
    this.onChange(this);
  }
}

/**
 * Per-group candidate sets shared by every unit of a run. Sets are seeded from
 * the store (earlier confirmed passwords first) followed by the run defaults.
 * Mutations are synchronous, so concurrent units never interleave inside one.
 */
export class PasswordCache {
  private readonly sets = new Map<string, CandidatePasswordSet>();

  constructor(
    private readonly store: PasswordStore | null,
    private readonly defaults: readonly string[] = [],
  ) {}

  forGroup(groupKey: string): CandidatePasswordSet {
    const existing = this.sets.get(groupKey);
    if (existing) {
      return existing;
    }
    const persisted = this.store?.getGroupPasswords(groupKey) ?? [];
    const set = new CandidatePasswordSet(groupKey, [...persisted, ...this.defaults], (changed) =>
      this.store?.saveGroupPasswords(changed.groupKey, [...changed.passwords]),
    );
    this.sets.set(groupKey, set);
    return set;
  }

  addHints(groupKey: string, hints: Iterable<string>): void {
    this.forGroup(groupKey).addHints(hints);
  }
}
