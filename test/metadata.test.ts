import { EncodeError } from '#@/errors.js';
import { loadQuizDefinition } from '#@/definition.js';
import { encodeMetadata } from '#@/metadata.js';
import type { QuizTable } from '#@/types.js';

import { bookDirectory, catchError, expectToBeInstanceOf } from '#$/utils.js';

describe('metadata', () => {
  it('encodes a definition as JSON', () => {
    const content = {
      name: 'Capitals',
      questions: [{ prompt: 'Capital of France?', answer: 'Paris' }],
    };

    expect(encodeMetadata(content)).toEqual(
      '{"name":"Capitals","questions":[{"prompt":"Capital of France?","answer":"Paris"}]}',
    );
  });

  it('preserves scalars, nesting and empty collections', () => {
    const content: QuizTable = {
      text: 'quote " and backslash \\',
      integer: -7,
      float: 2.5,
      flag: false,
      empty: {},
      list: [],
      deep: { rows: [[1, 2], [], [{ cell: true }]] },
    };

    expect(JSON.parse(encodeMetadata(content))).toEqual(content);
  });

  it('writes dates as ISO 8601 text', () => {
    expect(encodeMetadata({ due: new Date('2024-01-02T03:04:05.000Z') })).toEqual('{"due":"2024-01-02T03:04:05Z"}');
    expect(encodeMetadata({ due: new Date('2024-01-02T03:04:05.250Z') })).toEqual('{"due":"2024-01-02T03:04:05.250Z"}');
  });

  it('keeps local dates and times as written', () => {
    const { content } = loadQuizDefinition(bookDirectory, 'dates.toml');

    expect(JSON.parse(encodeMetadata(content))).toEqual({
      day: '1979-05-27',
      alarm: '07:32:00',
      local: '1979-05-27T07:32:00',
      instant: '1979-05-27T15:32:00Z',
    });
  });

  it('writes large integers as JSON integers', () => {
    expect(encodeMetadata({ id: 9007199254740993n, list: [-9007199254740993n] })).toEqual(
      '{"id":9007199254740993,"list":[-9007199254740993]}',
    );
  });

  it('rejects numbers without a JSON representation', () => {
    const error = catchError(() => encodeMetadata({ stats: [{ score: Number.POSITIVE_INFINITY }] }));

    expectToBeInstanceOf(error, EncodeError);
    expect(error.keyPath).toEqual('stats[0].score');
    expect(error.message).toEqual('Cannot encode stats[0].score: Infinity has no JSON representation');
  });

  it('rejects NaN', () => {
    expect(() => encodeMetadata({ ratio: Number.NaN })).toThrow(EncodeError);
  });
});
