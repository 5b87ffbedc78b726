import type { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail, withSpinner } from '../utils/cli.js';
import { ValidationError, formatIssue } from '../utils/errors.js';
import { getDb } from '../modules/state/db.js';
import { saveBatch } from '../modules/state/record-store.js';
import { validateBatch } from '../modules/records/validate.js';

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Validate a JSON batch of members, documents and votes and store it')
    .argument('<file>', 'JSON file with { members, documents, votes }')
    .option('--dry-run', 'Validate only; do not write to the database')
    .action(async (file: string, opts: { dryRun?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        let raw: unknown;
        try {
          raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
        } catch (err) {
          throw new ValidationError(`Could not read ${file}`, [
            { path: '', message: err instanceof Error ? err.message : String(err) },
          ]);
        }

        const batch = validateBatch(raw);

        console.log(chalk.bold('\n  Record Batch'));
        console.log(chalk.dim('  ═'.repeat(25)));
        console.log(`  Members:    ${chalk.cyan(String(batch.members.length))}`);
        console.log(`  Documents:  ${chalk.cyan(String(batch.documents.length))}`);
        console.log(`  Votes:      ${chalk.cyan(String(batch.votes.length))}`);

        if (batch.rejected.length > 0) {
          console.log(chalk.yellow(`\n  Skipped ${batch.rejected.length} malformed record(s):`));
          for (const r of batch.rejected.slice(0, 20)) {
            const label = r.id ? `${r.kind} ${r.id}` : `${r.kind} #${r.index}`;
            console.log(chalk.yellow(`    ${label}: ${r.issues.map(formatIssue).join('; ')}`));
          }
          if (batch.rejected.length > 20) {
            console.log(chalk.dim(`    ...and ${batch.rejected.length - 20} more`));
          }
        }

        if (opts.dryRun) {
          console.log(chalk.dim('\n  Dry run: nothing written.\n'));
          return;
        }

        const spinner = ora('Saving records...').start();
        const result = withSpinner(spinner, 'Saving failed', () => saveBatch(getDb(config.dbPath), batch));
        spinner.succeed(
          `Saved ${result.documents} documents, ${result.votes} votes, ` +
            `${result.membersInserted} new members (${result.partyCorrections} party corrections)`,
        );
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
