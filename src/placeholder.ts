import he from 'he';

import type { QuizConfig } from '#@/types.js';

export type PlaceholderQuiz = {
  name: string;
  questions: string;
};

export class PlaceholderBuilder {
  static CLASS_NAME = 'quiz-placeholder';

  private attributes: [string, string][];

  constructor() {
    this.attributes = [];
  }

  addData(key: string, value: string) {
    this.attributes.push([`data-${key}`, value]);
    return this;
  }

  build() {
    const attributes = this.attributes.map(([name, value]) => ` ${name}="${he.escape(value)}"`).join('');
    return `<div class="${PlaceholderBuilder.CLASS_NAME}"${attributes}></div>`;
  }
}

export function buildPlaceholder({ name, questions }: PlaceholderQuiz, config: QuizConfig) {
  const builder = new PlaceholderBuilder().addData('quiz-name', name).addData('quiz-questions', questions);

  if (config.logEndpoint !== undefined) {
    builder.addData('quiz-log-endpoint', config.logEndpoint);
  }

  // NOTE: Only the presence of the option is checked; `fullscreen = false` still enables it
  if (config.fullscreen !== undefined) {
    builder.addData('quiz-fullscreen', '');
  }

  return builder.build();
}
