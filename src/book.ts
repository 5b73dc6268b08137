import { satisfies } from 'semver';
import { P, match } from 'ts-pattern';

import { ProtocolError } from '#@/errors.js';
import { type Book, type BookItem, type Chapter, type PreprocessorContext, preprocessorInputSchema } from '#@/types.js';

export const SUPPORTED_HOST_VERSIONS = '>=0.4.0 <0.6.0';

export function parsePreprocessorInput(content: string): [PreprocessorContext, Book] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ProtocolError('input is not valid JSON', { cause: error });
  }

  const result = preprocessorInputSchema.safeParse(json);
  if (!result.success) {
    const [issue] = result.error.issues;
    const reason = issue ? `${issue.path.join('.') || 'input'}: ${issue.message}` : 'unexpected shape';
    throw new ProtocolError(reason, { cause: result.error });
  }

  return result.data;
}

export function checkHostVersion(version: string) {
  if (satisfies(version, SUPPORTED_HOST_VERSIONS, { includePrerelease: true })) {
    return true;
  }

  console.warn(
    `Warning: The quiz preprocessor supports mdbook ${SUPPORTED_HOST_VERSIONS}, but is being called from version ${version}`,
  );

  return false;
}

export function bookItems(book: Book) {
  return book.sections ?? book.items ?? [];
}

export function forEachChapter(items: BookItem[], callback: (chapter: Chapter) => void) {
  for (const item of items) {
    match(item)
      .with({ Chapter: P.select() }, (chapter) => {
        callback(chapter);
        forEachChapter(chapter.sub_items, callback);
      })
      .otherwise(() => {});
  }
}
