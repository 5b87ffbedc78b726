import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail } from '../utils/cli.js';
import { formatSigned, padRight } from '../utils/format.js';
import { getDb } from '../modules/state/db.js';
import { createAlignmentScoreModel } from '../modules/state/models/alignment-scores.js';

export function registerPartiesCommand(program: Command): void {
  program
    .command('parties')
    .description('Average latest alignment score per party')
    .option('--axis <name>', 'Only this axis')
    .option('--json', 'Output as JSON')
    .action(async (opts: { axis?: string; json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const db = getDb(config.dbPath);
        const summary = createAlignmentScoreModel(db).partySummary({ axis: opts.axis });

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }
        if (summary.length === 0) {
          console.log(chalk.yellow('\n  No scored members with party data.\n'));
          return;
        }

        let axis = '';
        for (const row of summary) {
          if (row.axis !== axis) {
            axis = row.axis;
            console.log(chalk.bold(`\n  ${axis}`));
          }
          console.log(
            `  ${padRight(row.party ?? 'Independent', 16)} ${formatSigned(row.avgValue)}  ` +
              chalk.dim(`${row.members} member(s), avg confidence ${row.avgConfidence.toFixed(2)}`),
          );
        }
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
