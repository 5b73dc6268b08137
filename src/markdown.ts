import { Marked, type Token, type TokenizerExtension, type Tokens } from 'marked';

export type MarkdownEvent =
  | { type: 'text'; text: string }
  | { type: 'softbreak' }
  | { type: 'html'; html: string }
  | { type: 'markup'; kind: string; raw: string };

// NOTE: marked folds link reference definitions into `tokens.links` and
// leaves no token behind for them
const linkDefinition: TokenizerExtension = {
  name: 'linkDefinition',
  level: 'block',
  tokenizer(src) {
    const [raw] = /^ {0,3}\[(?!\^)[^\]\n]+\]:[^\n]*(?:\n+|$)/.exec(src) ?? [];
    if (!raw) {
      return undefined;
    }

    return { type: 'linkDefinition', raw };
  },
};

const markdown = new Marked({ gfm: true, extensions: [linkDefinition] });

function is<T extends Token>(type: T['type']) {
  return (token: Token): token is T => token.type === type;
}

const isParagraph = is<Tokens.Paragraph>('paragraph');
const isHeading = is<Tokens.Heading>('heading');
const isBlockquote = is<Tokens.Blockquote>('blockquote');
const isList = is<Tokens.List>('list');

function markup(kind: string, raw: string): MarkdownEvent {
  return { type: 'markup', kind, raw };
}

function* textEvents(raw: string): Generator<MarkdownEvent> {
  const [first = '', ...rest] = raw.split('\n');

  if (first) {
    yield { type: 'text', text: first };
  }

  for (const line of rest) {
    yield { type: 'softbreak' };

    if (line) {
      yield { type: 'text', text: line };
    }
  }
}

function inlineEvents(text: string, tokens: Token[]): MarkdownEvent[] {
  if (tokens.map((token) => token.raw).join('') !== text) {
    return [...textEvents(text)];
  }

  return tokens.flatMap((token) => (token.type === 'text' ? [...textEvents(token.raw)] : [markup(token.type, token.raw)]));
}

function startsLine(previous: MarkdownEvent | undefined) {
  return !previous || previous.type === 'softbreak' || (previous.type === 'markup' && previous.raw.endsWith('\n'));
}

function endsLine(next: MarkdownEvent | undefined) {
  return !next || next.type === 'softbreak' || (next.type === 'markup' && next.kind === 'br');
}

// Whitespace around the content of a line is markup, not text.
function* trimLines(events: MarkdownEvent[]): Generator<MarkdownEvent> {
  for (const [index, event] of events.entries()) {
    if (event.type !== 'text') {
      yield event;
      continue;
    }

    let content = event.text;
    const leading = startsLine(events[index - 1]) ? (/^[ \t]*/.exec(content)?.[0] ?? '') : '';
    content = content.slice(leading.length);
    const trailing = endsLine(events[index + 1]) ? (/[ \t]*$/.exec(content)?.[0] ?? '') : '';
    content = content.slice(0, content.length - trailing.length);

    if (leading) {
      yield markup('space', leading);
    }
    if (content) {
      yield { type: 'text', text: content };
    }
    if (trailing) {
      yield markup('space', trailing);
    }
  }
}

function* leafEvents({ type, raw, text, tokens }: Tokens.Paragraph | Tokens.Heading): Generator<MarkdownEvent> {
  const marker = type === 'heading' ? (/^ {0,3}#{1,6}/.exec(raw)?.[0].length ?? 0) : 0;
  const index = raw.indexOf(text, marker);
  if (index < 0) {
    yield markup(type, raw);
    return;
  }

  if (index) {
    yield markup(type, raw.slice(0, index));
  }

  yield* trimLines(inlineEvents(text, tokens));

  const trailing = raw.slice(index + text.length);
  if (trailing) {
    yield markup('space', trailing);
  }
}

function linePrefixes(rawLines: string[], innerLines: string[]) {
  const prefixes: string[] = [];

  for (const [index, line] of innerLines.entries()) {
    const rawLine = rawLines[index];
    if (rawLine === undefined || !rawLine.endsWith(line)) {
      return undefined;
    }

    prefixes.push(rawLine.slice(0, rawLine.length - line.length));
  }

  return prefixes;
}

// Block quotes and list items hold a document of their own: `inner` is `raw`
// with the container prefix taken off every line. The inner events are woven
// back together with those prefixes.
function* containerEvents(kind: string, raw: string, inner: string): Generator<MarkdownEvent> {
  const events = [...blockEvents(inner)];
  const rawLines = raw.split('\n');
  const innerLines = inner.split('\n');
  const prefixes = linePrefixes(rawLines, innerLines);

  if (!prefixes || serialize(events) !== inner) {
    yield markup(kind, raw);
    return;
  }

  let line = 0;
  function* prefix() {
    const text = prefixes?.[line];
    if (text) {
      yield markup(kind, text);
    }
  }

  yield* prefix();

  for (const event of events) {
    if (event.type === 'softbreak') {
      yield event;
      line += 1;
      yield* prefix();
    } else if (event.type === 'markup' && event.raw.includes('\n')) {
      const [first = '', ...rest] = event.raw.split('\n');
      if (first) {
        yield markup(event.kind, first);
      }

      for (const piece of rest) {
        yield markup(event.kind, '\n');
        line += 1;
        yield* prefix();

        if (piece) {
          yield markup(event.kind, piece);
        }
      }
    } else {
      yield event;
    }
  }

  const leftover = rawLines.slice(innerLines.length);
  if (leftover.length) {
    yield markup(kind, `\n${leftover.join('\n')}`);
  }
}

function* listEvents({ raw, items }: Tokens.List): Generator<MarkdownEvent> {
  const itemsRaw = items.map((item) => item.raw).join('');
  if (!raw.startsWith(itemsRaw)) {
    yield markup('list', raw);
    return;
  }

  for (const item of items) {
    yield* containerEvents('list_item', item.raw, item.text);
  }

  const trailing = raw.slice(itemsRaw.length);
  if (trailing) {
    yield markup('list', trailing);
  }
}

function* blockEvents(source: string): Generator<MarkdownEvent> {
  for (const token of markdown.lexer(source)) {
    if (isParagraph(token) || isHeading(token)) {
      yield* leafEvents(token);
    } else if (isBlockquote(token)) {
      yield* containerEvents('blockquote', token.raw, token.text);
    } else if (isList(token)) {
      yield* listEvents(token);
    } else {
      yield markup(token.type, token.raw);
    }
  }
}

export function tokenize(source: string): Generator<MarkdownEvent> {
  return blockEvents(source);
}

export function serialize(events: Iterable<MarkdownEvent>) {
  let output = '';

  for (const event of events) {
    switch (event.type) {
      case 'text': {
        output += event.text;
        break;
      }
      case 'softbreak': {
        output += '\n';
        break;
      }
      case 'html': {
        output += event.html;
        break;
      }
      case 'markup': {
        output += event.raw;
        break;
      }
    }
  }

  return output;
}
