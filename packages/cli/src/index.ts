#!/usr/bin/env node

// nsmap command line
// - `resolve` reads a JSON entity tree (or an array of sub-document roots) and a
//   type table, resolves namespace prefixes and schema locations, and prints the
//   root element definitions (xml) or the maps with diagnostics (json).
// - `vocab` prints the vocabulary table entries.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  ErrorPresenter,
  NamespaceResolver,
  NsmapError,
  TypeMetadataTable,
  UnknownNamespaceError,
  isNsmapError,
  renderNamespaceDefinitions,
  type NamespaceResolution,
} from '@nsmap/core';
import { renderCLIView } from './render.js';
import {
  collectRepeatable,
  errorFormatFor,
  parsePairs,
  resolveIdNamespace,
  resolveLogLevel,
  resolveOutputFormat,
  resolveVocabularyTables,
  type OutputFormat,
  type ResolveCliOptions,
  type VocabCliOptions,
} from './flags.js';
import { loadDocument, loadTypeTable } from './input.js';

class CliInternalError extends NsmapError {}

function runResolve(options: ResolveCliOptions): void {
  if (!options.document) {
    throw new Error('Missing --document <file>');
  }
  const format = resolveOutputFormat(options.format);
  const logLevel = resolveLogLevel(options.logLevel);

  const resolver = new NamespaceResolver({
    types: options.types ? loadTypeTable(options.types) : new TypeMetadataTable(),
    vocabularies: resolveVocabularyTables(options),
    idNamespace: resolveIdNamespace(options),
    validateAliases: options.validateAliases,
    logLevel,
  });

  const overrides = {
    prefixes: parsePairs(options.ns, '--ns', 'prefix=namespace'),
    namespaceAliases: parsePairs(options.alias, '--alias', 'namespace=prefix'),
    schemaLocations: parsePairs(
      options.schemaloc,
      '--schemaloc',
      'namespace=location'
    ),
  };

  const document = loadDocument(options.document);
  const result = Array.isArray(document)
    ? resolver.resolveAll(document, overrides)
    : resolver.resolve(document, overrides);

  writeResolution(result, format);
}

function writeResolution(result: NamespaceResolution, format: OutputFormat): void {
  if (format === 'json') {
    const payload = {
      namespaces: Object.fromEntries(result.namespaces),
      schemaLocations: Object.fromEntries(result.schemaLocations),
      diagnostics: result.diagnostics,
    };
    process.stdout.write(JSON.stringify(payload, null, 2) + '\n');
    return;
  }
  const text = renderNamespaceDefinitions(
    result.namespaces,
    result.schemaLocations
  );
  process.stdout.write(text + '\n');
}

function runVocab(options: VocabCliOptions): void {
  const tables = resolveVocabularyTables(options);
  const entryFor = (namespace: string, prefix: string) => ({
    namespace,
    prefix,
    schemaLocation: tables.schemaLocations.get(namespace),
  });

  if (options.namespace !== undefined) {
    const prefix = tables.prefixes.get(options.namespace);
    if (prefix === undefined) {
      throw new UnknownNamespaceError({ namespace: options.namespace });
    }
    process.stdout.write(
      JSON.stringify(entryFor(options.namespace, prefix), null, 2) + '\n'
    );
    return;
  }

  const entries = Array.from(tables.prefixes, ([namespace, prefix]) =>
    entryFor(namespace, prefix)
  );
  process.stdout.write(JSON.stringify(entries, null, 2) + '\n');
}

function handleCliError(err: unknown, format: OutputFormat = 'xml'): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: NsmapError;
  if (isNsmapError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new CliInternalError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (format === 'json') {
    console.error(JSON.stringify(presenter.formatForJSON(error), null, 2));
  } else {
    console.error(renderCLIView(presenter.formatForCLI(error)));
  }
  process.exit(error.getExitCode());
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('nsmap')
    .description('Resolve XML namespace prefixes and schema locations')
    .version('0.1.0');

  program
    .command('resolve')
    .description('Resolve the root element namespace definitions of a document')
    .option('-d, --document <file>', 'JSON entity tree (or array of roots)')
    .option('-t, --types <file>', 'JSON type table: { [tag]: { namespace, prefix, qualifiedName } }')
    .option(
      '--vocabularies <file>',
      'Extension vocabulary file layered over the bundled tables (repeatable)',
      collectRepeatable,
      []
    )
    .option(
      '--no-bundled-vocabularies',
      'Build the tables from the --vocabularies files alone'
    )
    .option(
      '--ns <prefix=namespace>',
      'Prefix override (repeatable)',
      collectRepeatable,
      []
    )
    .option(
      '--alias <namespace=prefix>',
      'Namespace alias override (repeatable)',
      collectRepeatable,
      []
    )
    .option(
      '--schemaloc <namespace=location>',
      'Schema location override (repeatable)',
      collectRepeatable,
      []
    )
    .option('--id-namespace <uri>', 'Identifier namespace URI')
    .option('--id-prefix <prefix>', 'Identifier namespace prefix')
    .option('-f, --format <format>', 'Output format: xml|json', 'xml')
    .option('--no-validate-aliases', 'Skip the shared-prefix check on --alias')
    .option('--log-level <level>', 'silent|error|warn|info|debug')
    .action((options: ResolveCliOptions) => {
      try {
        runResolve(options);
      } catch (err: unknown) {
        handleCliError(err, errorFormatFor(options.format));
      }
    });

  program
    .command('vocab')
    .description('Print vocabulary table entries')
    .option('--namespace <uri>', 'Print the entry of one namespace')
    .option(
      '--vocabularies <file>',
      'Extension vocabulary file layered over the bundled tables (repeatable)',
      collectRepeatable,
      []
    )
    .option(
      '--no-bundled-vocabularies',
      'Build the tables from the --vocabularies files alone'
    )
    .action((options: VocabCliOptions) => {
      try {
        runVocab(options);
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram()
    .parseAsync(argv)
    .catch((err: unknown) => handleCliError(err));
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
