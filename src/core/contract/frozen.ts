import { ContractError } from '../types/Errors';

/**
 * Map returned by the map validator. Populated once on construction, every
 * later write throws, like the frozen records and lists next to it.
 */
export class FrozenMap<K, V> extends Map<K, V> {
  private sealed = false;

  constructor(entries: Iterable<readonly [K, V]>) {
    super(entries);
    this.sealed = true;
  }

  set(key: K, value: V): this {
    if (this.sealed) {
      throw ContractError.immutable('cleaned map is read-only', { operation: 'set' });
    }
    return super.set(key, value);
  }

  delete(): boolean {
    throw ContractError.immutable('cleaned map is read-only', { operation: 'delete' });
  }

  clear(): void {
    throw ContractError.immutable('cleaned map is read-only', { operation: 'clear' });
  }
}

/**
 * Set returned by the set validator; read-only once constructed
 */
export class FrozenSet<T> extends Set<T> {
  private sealed = false;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
  }

  add(value: T): this {
    if (this.sealed) {
      throw ContractError.immutable('cleaned set is read-only', { operation: 'add' });
    }
    return super.add(value);
  }

  delete(): boolean {
    throw ContractError.immutable('cleaned set is read-only', { operation: 'delete' });
  }

  clear(): void {
    throw ContractError.immutable('cleaned set is read-only', { operation: 'clear' });
  }
}
