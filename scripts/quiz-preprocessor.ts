#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { fileURLToPath } from 'node:url';

import yargs from 'yargs';

import { checkHostVersion, parsePreprocessorInput } from '#@/book.js';
import { QuizPreprocessor } from '#@/preprocessor.js';
import { failurePolicySchema } from '#@/types.js';

const cli = yargs(process.argv.slice(2))
  .scriptName(basename(fileURLToPath(import.meta.url), '.js'))
  .option('on-error', {
    describe: 'Abort the build or skip the chapter when a quiz cannot be expanded',
    choices: failurePolicySchema.options,
    default: failurePolicySchema.enum.abort,
  })
  .command(
    'supports <renderer>',
    'Exits successfully when the renderer is supported',
    (args) =>
      args.positional('renderer', {
        describe: 'Name of the renderer',
        type: 'string',
        demandOption: true,
      }),
    ({ renderer }) => {
      process.exitCode = new QuizPreprocessor().supportsRenderer(renderer) ? 0 : 1;
    },
  )
  .command(
    '$0',
    'Reads [context, book] as JSON from stdin and writes the processed book to stdout',
    (args) => args,
    ({ onError }) => {
      const [context, book] = parsePreprocessorInput(readFileSync(process.stdin.fd).toString());
      checkHostVersion(context.mdbook_version);

      const preprocessor = new QuizPreprocessor({ onError: failurePolicySchema.parse(onError) });
      process.stdout.write(JSON.stringify(preprocessor.run(context, book)));
    },
  )
  .strict()
  .fail(false)
  .help();

try {
  await cli.parseAsync();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
