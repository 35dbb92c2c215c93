/**
 * Lazy, restartable async sequences.
 * Each iteration calls the factory again, so a sequence can be walked any
 * number of times and always reflects the store as of that walk.
 */

export function lazySequence<T>(factory: () => AsyncGenerator<T>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: factory,
  };
}

export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}
