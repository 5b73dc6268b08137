import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const bookDirectory = fileURLToPath(new URL('./fixtures/book', import.meta.url));

export function fixturePath(...segments: string[]) {
  return join(bookDirectory, ...segments);
}

export function expectToBeInstanceOf<T, A extends unknown[]>(
  arg: unknown,
  ctor: new (...args: A) => T,
): asserts arg is T {
  expect(arg).toBeInstanceOf(ctor);
}

export function catchError(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('Expected function to throw');
}
