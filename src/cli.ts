#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { dumpTable, listTables, loadCatalog, runQuery } from './commands.js';
import { config } from './config.js';
import { CatalogInvariantError, SchemaSnapshotError } from './errors.js';
import { cliLogger } from './utils/logger.js';

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('infoschema')
    .option('schema', { type: 'string', demandOption: true, desc: 'Path to a JSON schema document' })
    .option('dialect', {
      type: 'string',
      choices: ['native', 'postgresql'],
      default: config.CATALOG_DIALECT,
      desc: 'Naming convention of the introspection tables',
    })
    .command('tables', 'List introspection tables with their row counts', (y) => y, async (argv) => {
      console.log(listTables(await loadCatalog(argv)));
    })
    .command(
      'dump <table>',
      'Print the rows of one introspection table as JSON',
      (y) => y.positional('table', { type: 'string', demandOption: true, desc: 'Table name (any case)' }),
      async (argv) => {
        console.log(dumpTable(await loadCatalog(argv), argv.table));
      },
    )
    .command(
      'query <sql>',
      'Run SQL against the catalog (tables live in the information_schema database)',
      (y) => y.positional('sql', { type: 'string', demandOption: true, desc: 'SQL statement' }),
      async (argv) => {
        console.log(await runQuery(await loadCatalog(argv), argv.sql));
      },
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .parseAsync();
}

main().catch((error: unknown) => {
  if (error instanceof SchemaSnapshotError) {
    console.error('Invalid schema document:');
    for (const issue of error.issues) {
      console.error(`  ${issue.path}: ${issue.message}`);
    }
  } else if (error instanceof CatalogInvariantError) {
    // already logged where it was raised
    console.error(`Internal error: ${error.message}`);
  } else {
    cliLogger.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
