/**
 * Typed call-scoped storage.
 *
 * Values are held by their key, one slot per Attributes instance, so a
 * key's type parameter is the only type information needed to read it.
 */

export class AttributeKey<T> {
  readonly name: string;
  private readonly values = new WeakMap<Attributes, { value: T }>();

  constructor(name: string) {
    this.name = name;
  }

  /** @internal */
  read(owner: Attributes): { value: T } | undefined {
    return this.values.get(owner);
  }

  /** @internal */
  write(owner: Attributes, value: T): void {
    this.values.set(owner, { value });
  }

  /** @internal */
  erase(owner: Attributes): void {
    this.values.delete(owner);
  }

  toString(): string {
    return `AttributeKey(${this.name})`;
  }
}

export class Attributes {
  private readonly keys = new Set<AttributeKey<unknown>>();

  /** Value for `key`; throws when absent. */
  get<T>(key: AttributeKey<T>): T {
    const slot = key.read(this);
    if (!slot) {
      throw new Error(`No instance for key ${key.name}`);
    }
    return slot.value;
  }

  getOrNull<T>(key: AttributeKey<T>): T | null {
    return key.read(this)?.value ?? null;
  }

  contains(key: AttributeKey<unknown>): boolean {
    return key.read(this) !== undefined;
  }

  put<T>(key: AttributeKey<T>, value: T): void {
    key.write(this, value);
    this.keys.add(key);
  }

  remove(key: AttributeKey<unknown>): void {
    key.erase(this);
    this.keys.delete(key);
  }

  /** Existing value for `key`, or the result of `create` stored under it. */
  computeIfAbsent<T>(key: AttributeKey<T>, create: () => T): T {
    const slot = key.read(this);
    if (slot) {
      return slot.value;
    }
    const value = create();
    this.put(key, value);
    return value;
  }

  get allKeys(): AttributeKey<unknown>[] {
    return [...this.keys];
  }
}
