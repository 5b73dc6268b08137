import { P, match } from 'ts-pattern';

import { EncodeError } from '#@/errors.js';
import type { QuizTable } from '#@/types.js';

type JsonValue = string | number | bigint | boolean | JsonValue[] | { [key: string]: JsonValue };

function isTable(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

type KeyPath = (string | number)[];

function formatKeyPath(keys: KeyPath) {
  return keys.map((key, index) => (typeof key === 'number' ? `[${key}]` : index ? `.${key}` : key)).join('');
}

function toInterchange(value: unknown, keys: KeyPath): JsonValue {
  return match(value)
    .with(P.string, P.boolean, (scalar) => scalar)
    .with(P.number, (number) => {
      if (!Number.isFinite(number)) {
        throw new EncodeError(formatKeyPath(keys), `${number} has no JSON representation`);
      }

      return number;
    })
    .with(P.bigint, (integer) => integer)
    // NOTE: local dates, times and date-times keep their own `toISOString`
    // overrides; offset date-times are written in UTC
    .with(P.instanceOf(Date), (date) => date.toISOString().replace(/\.000(?=Z?$)/, ''))
    .with(P.array(), (items) => items.map((item, index) => toInterchange(item, [...keys, index])))
    .with(P.when(isTable), (table) => {
      const entries = Object.entries(table).map(([key, item]): [string, JsonValue] => [
        key,
        toInterchange(item, [...keys, key]),
      ]);

      return Object.fromEntries(entries);
    })
    .otherwise((unsupported) => {
      throw new EncodeError(formatKeyPath(keys), `unsupported value of type ${typeof unsupported}`);
    });
}

// `JSON.stringify` has no way to write a bigint as a plain integer.
function stringify(value: JsonValue): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return `[${value.map(stringify).join(',')}]`;
  }

  if (typeof value === 'object') {
    return `{${Object.entries(value)
      .map(([key, item]) => `${JSON.stringify(key)}:${stringify(item)}`)
      .join(',')}}`;
  }

  return JSON.stringify(value);
}

export function encodeMetadata(content: QuizTable) {
  return stringify(toInterchange(content, []));
}
