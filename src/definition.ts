import { readFileSync } from 'node:fs';
import { parse as parsePath, resolve } from 'node:path';

import * as TOML from '@iarna/toml';

import { FormatError, IoError } from '#@/errors.js';
import type { QuizDefinition, QuizTable } from '#@/types.js';

function readDefinition(path: string) {
  try {
    return readFileSync(path).toString();
  } catch (error) {
    throw new IoError(path, { cause: error });
  }
}

function parseDefinition(path: string, content: string): QuizTable {
  try {
    return TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] ?? error.message : String(error);
    throw new FormatError(path, reason, { cause: error });
  }
}

export function loadQuizDefinition(baseDirectory: string, relativePath: string): QuizDefinition {
  const path = resolve(baseDirectory, relativePath);
  const { name } = parsePath(relativePath);

  return {
    name,
    path,
    content: parseDefinition(path, readDefinition(path)),
  };
}
