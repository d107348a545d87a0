import { InvalidStateError } from "../errors/invalid-state.error";

/**
 * Finite, non-restartable sequence of rows.
 *
 * Rows are mapped lazily while iterating; a second iteration throws.
 */
export class RowSequence<T> implements Iterable<T> {
  private consumed = false;

  public constructor(private readonly produce: () => Iterator<T>) {}

  public static from<TSource, T>(
    source: readonly TSource[],
    map: (item: TSource, index: number) => T,
  ): RowSequence<T> {
    return new RowSequence(function* () {
      for (let index = 0; index < source.length; index++) {
        yield map(source[index], index);
      }
    });
  }

  public get isConsumed(): boolean {
    return this.consumed;
  }

  public [Symbol.iterator](): Iterator<T> {
    if (this.consumed) {
      throw new InvalidStateError("Row sequence can only be iterated once.");
    }

    this.consumed = true;

    return this.produce();
  }

  /**
   * Consume the sequence into an array
   */
  public toArray(): T[] {
    return Array.from(this);
  }
}
