import { resolve } from 'node:path';

import { bookItems, forEachChapter } from '#@/book.js';
import { resolveQuizConfig } from '#@/config.js';
import { rewriteDocument } from '#@/rewriter.js';
import type { Book, FailurePolicy, PreprocessorContext } from '#@/types.js';

export type QuizPreprocessorOptions = {
  onError?: FailurePolicy;
};

export class QuizPreprocessor {
  static NAME = 'quiz';

  onError: FailurePolicy;

  constructor(options: QuizPreprocessorOptions = {}) {
    this.onError = options.onError || 'abort';
  }

  get name() {
    return QuizPreprocessor.NAME;
  }

  supportsRenderer(renderer: string) {
    return renderer !== 'not-supported';
  }

  run(context: PreprocessorContext, book: Book) {
    const config = resolveQuizConfig(context.config.preprocessor?.[this.name]);
    const sourceDirectory = resolve(context.root, context.config.book.src);

    forEachChapter(bookItems(book), (chapter) => {
      if (chapter.path === null) {
        return;
      }

      const path = resolve(sourceDirectory, chapter.path);
      try {
        chapter.content = rewriteDocument({ path, content: chapter.content }, config);
      } catch (error) {
        if (this.onError === 'abort') {
          throw error;
        }

        console.warn(`Skipping quizzes in chapter "${chapter.name}":`, error instanceof Error ? error.message : error);
      }
    });

    return book;
  }
}
