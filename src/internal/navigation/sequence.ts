/**
 * Lazy, restartable sequence. Every iteration calls the factory again, so
 * no cursor state is shared between consumers.
 */
export class Sequence<T> implements Iterable<T> {
  readonly #factory: () => Iterator<T>;

  constructor(factory: () => Iterator<T>) {
    this.#factory = factory;
  }

  static of<T>(values: readonly T[]): Sequence<T> {
    return new Sequence(() => values[Symbol.iterator]());
  }

  [Symbol.iterator](): Iterator<T> {
    return this.#factory();
  }

  map<U>(transform: (value: T) => U): Sequence<U> {
    const source = this;
    return new Sequence(function* () {
      for (const value of source) {
        yield transform(value);
      }
    });
  }

  filter(predicate: (value: T) => boolean): Sequence<T> {
    const source = this;
    return new Sequence(function* () {
      for (const value of source) {
        if (predicate(value)) {
          yield value;
        }
      }
    });
  }

  count(): number {
    let total = 0;
    for (const _ of this) {
      total += 1;
    }
    return total;
  }

  first(): T | undefined {
    for (const value of this) {
      return value;
    }
    return undefined;
  }

  toArray(): T[] {
    return [...this];
  }
}
