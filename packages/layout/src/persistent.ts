/**
 * Persistent sequences backing the writer model.
 *
 * Both structures share their tails between versions, so forking a context
 * for a trial or a measurement never copies the document built so far.
 */

// ============================================================================
// Cons List
// ============================================================================

export interface ConsCell<T> {
  readonly head: T;
  readonly tail: ConsCell<T> | null;
  readonly size: number;
}

export function cons<T>(head: T, tail: ConsCell<T> | null): ConsCell<T> {
  return { head, tail, size: tail === null ? 1 : tail.size + 1 };
}

/** Replace the first element, keeping the shared tail. */
export function withHead<T>(list: ConsCell<T>, head: T): ConsCell<T> {
  return { head, tail: list.tail, size: list.size };
}

export function* iterateCons<T>(list: ConsCell<T> | null): Generator<T> {
  for (let cell = list; cell !== null; cell = cell.tail) {
    yield cell.head;
  }
}

/** Elements in insertion order (the reverse of cons order). */
export function consToArray<T>(list: ConsCell<T> | null): T[] {
  return [...iterateCons(list)].reverse();
}

// ============================================================================
// Append Log
// ============================================================================

interface LogChunk<T> {
  readonly items: readonly T[];
  /** Number of items in the log before this chunk */
  readonly offset: number;
}

/**
 * Append-only log of items, grouped in the chunks they were appended with.
 * Appending returns a new log; older versions stay valid.
 */
export class AppendLog<T> {
  private readonly chunks: ConsCell<LogChunk<T>> | null;
  public readonly length: number;

  private constructor(chunks: ConsCell<LogChunk<T>> | null, length: number) {
    this.chunks = chunks;
    this.length = length;
  }

  static empty<T>(): AppendLog<T> {
    return new AppendLog<T>(null, 0);
  }

  static of<T>(items: readonly T[]): AppendLog<T> {
    return AppendLog.empty<T>().append(items);
  }

  append(items: readonly T[]): AppendLog<T> {
    if (items.length === 0) return this;
    const chunk: LogChunk<T> = { items, offset: this.length };
    return new AppendLog(cons(chunk, this.chunks), this.length + items.length);
  }

  /** Items from newest to oldest. */
  *reversed(): Generator<T> {
    for (const chunk of iterateCons(this.chunks)) {
      for (let i = chunk.items.length - 1; i >= 0; i--) {
        yield chunk.items[i];
      }
    }
  }

  toArray(): T[] {
    return this.chunksFrom(0).flat();
  }

  /** Chunks appended once the log had reached `index` items, oldest first. */
  chunksFrom(index: number): Array<readonly T[]> {
    const result: Array<readonly T[]> = [];
    for (const chunk of iterateCons(this.chunks)) {
      if (chunk.offset < index) break;
      result.push(chunk.items);
    }
    return result.reverse();
  }
}
