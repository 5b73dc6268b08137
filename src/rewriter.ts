import { dirname } from 'node:path';

import { loadQuizDefinition } from '#@/definition.js';
import { type DirectiveMatch, matchDirective } from '#@/directive.js';
import { QuizError } from '#@/errors.js';
import { type MarkdownEvent, serialize, tokenize } from '#@/markdown.js';
import { encodeMetadata } from '#@/metadata.js';
import { buildPlaceholder } from '#@/placeholder.js';
import type { QuizConfig } from '#@/types.js';

export type DocumentUnit = {
  path: string;
  content: string;
};

export type RewriteContext = {
  source: string;
  directory: string;
  config: QuizConfig;
};

function expandQuiz(directive: DirectiveMatch, { source, directory, config }: RewriteContext) {
  try {
    const { name, content } = loadQuizDefinition(directory, directive.path);
    return buildPlaceholder({ name, questions: encodeMetadata(content) }, config);
  } catch (error) {
    if (error instanceof QuizError) {
      throw error.locate({ source, argument: directive.argument });
    }

    throw error;
  }
}

export function* expandDirectives(events: Iterable<MarkdownEvent>, context: RewriteContext): Generator<MarkdownEvent> {
  for (const event of events) {
    const directive = event.type === 'text' ? matchDirective(event.text) : undefined;
    if (!directive) {
      yield event;
      continue;
    }

    yield { type: 'html', html: expandQuiz(directive, context) };
  }
}

export function rewriteDocument({ path, content }: DocumentUnit, config: QuizConfig) {
  const context = { source: path, directory: dirname(path), config };

  return serialize(expandDirectives(tokenize(content), context));
}
