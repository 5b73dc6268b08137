const quizDirective = /^\{\{#quiz ([^}]+)\}\}$/;

export type DirectiveMatch = {
  argument: string;
  path: string;
};

function unquote(argument: string) {
  const trimmed = argument.trim();
  const [first] = trimmed;
  if (trimmed.length >= 2 && (first === '"' || first === "'") && trimmed.endsWith(first)) {
    return trimmed.slice(1, -1);
  }

  return trimmed;
}

export function matchDirective(text: string): DirectiveMatch | undefined {
  const [, argument] = quizDirective.exec(text) ?? [];
  if (argument === undefined) {
    return undefined;
  }

  return { argument, path: unquote(argument) };
}
