import camelCase from 'lodash/camelCase.js';
import kebabCase from 'lodash/kebabCase.js';
import mapKeys from 'lodash/mapKeys.js';
import pick from 'lodash/pick.js';

import { ConfigError } from '#@/errors.js';
import { type QuizConfig, quizConfigSchema } from '#@/types.js';

const optionNames = ['log-endpoint', 'fullscreen'];

export function resolveQuizConfig(table: Record<string, unknown> = {}): QuizConfig {
  const options = mapKeys(pick(table, optionNames), (_, key) => camelCase(key));
  const result = quizConfigSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(({ path, message }) => `${path.map(String).map(kebabCase).join('.')}: ${message}`);
    throw new ConfigError(issues, { cause: result.error });
  }

  return result.data;
}
