#!/usr/bin/env node
/**
 * serde-markdown CLI: transcodes stdin to stdout.
 *
 *   serde-markdown encode < value.json > value.md
 *   serde-markdown decode < value.md > value.json
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CodecError } from './errors.js';
import { jsonToMarkdown, markdownToJson } from './json.js';
import { DEFAULT_INDENT_WIDTH } from './lexer.js';
import { DEFAULT_MAX_DEPTH } from './parser.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function run(transcode: (input: string) => string): Promise<void> {
  const input = await readStdin();
  process.stdout.write(transcode(input));
}

async function main(): Promise<void> {
  await yargs(hideBin(process.argv))
    .scriptName('serde-markdown')
    .option('max-depth', { type: 'number', default: DEFAULT_MAX_DEPTH, describe: 'Maximum value nesting depth' })
    .option('indent-width', { type: 'number', default: DEFAULT_INDENT_WIDTH, describe: 'Spaces per list nesting level' })
    .command(
      'encode',
      'Read JSON from stdin and write the Markdown form',
      (y) => y,
      (argv) => run((input) => jsonToMarkdown(input, { maxDepth: argv.maxDepth, indentWidth: argv.indentWidth }))
    )
    .command(
      'decode',
      'Read the Markdown form from stdin and write JSON',
      (y) =>
        y
          .option('lenient', { type: 'boolean', default: false, describe: 'Trust type URIs over marker labels' })
          .option('indent', { type: 'number', default: 2, describe: 'JSON indentation' }),
      (argv) =>
        run((input) =>
          markdownToJson(input, {
            maxDepth: argv.maxDepth,
            indentWidth: argv.indentWidth,
            strictMarkers: !argv.lenient,
            indent: argv.indent,
          })
        )
    )
    .demandCommand(1)
    .strict()
    .parseAsync();
}

main().catch((err: unknown) => {
  if (err instanceof CodecError) {
    console.error(err.toString());
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
