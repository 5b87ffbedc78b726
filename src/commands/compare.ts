import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail } from '../utils/cli.js';
import { formatSigned, formatWindow, padRight } from '../utils/format.js';
import { getDb } from '../modules/state/db.js';
import { createAlignmentScoreModel } from '../modules/state/models/alignment-scores.js';
import { createMemberModel } from '../modules/state/models/members.js';
import { classifyScore } from '../modules/aggregate/labels.js';
import { loadScoringProfile } from '../modules/engine/profile.js';

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Compare the latest scores of several members side by side, with a per-topic breakdown')
    .argument('<memberIds...>', 'Member ids to compare')
    .option('--axis <name>', 'Only this axis')
    .option('--json', 'Output as JSON')
    .action(async (memberIds: string[], opts: { axis?: string; json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const db = getDb(config.dbPath);
        const members = createMemberModel(db);
        const scores = createAlignmentScoreModel(db).latest({ memberIds, axis: opts.axis });
        const profile = loadScoringProfile(config.scoringProfilePath);

        if (opts.json) {
          console.log(JSON.stringify(scores, null, 2));
          return;
        }

        const axes = [...new Set(scores.map(s => s.axis))].sort();
        if (axes.length === 0) {
          console.log(chalk.yellow('\n  No stored scores for these members.\n'));
          return;
        }

        for (const axis of axes) {
          console.log(chalk.bold(`\n  ${axis}`));
          for (const memberId of memberIds) {
            const member = members.getById(memberId);
            const name = member ? `${member.name} (${member.party ?? 'I'})` : memberId;
            const rows = scores.filter(s => s.axis === axis && s.memberId === memberId);
            if (rows.length === 0) {
              console.log(`  ${padRight(name, 30)} ${chalk.dim('no score')}`);
              continue;
            }
            for (const s of rows) {
              console.log(
                `  ${padRight(name, 30)} ${formatSigned(s.value)}  conf ${s.confidence.toFixed(2)}  ` +
                  `${classifyScore(s, profile.axes[axis])}  ${chalk.dim(formatWindow(s.window))}`,
              );
              for (const t of s.topics) {
                const value = t.confidence > 0 ? formatSigned(t.value) : '  n/a ';
                console.log(chalk.dim(`    ${padRight(t.topic, 28)} ${value}  ${t.documents} doc(s)`));
              }
            }
          }
        }
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
