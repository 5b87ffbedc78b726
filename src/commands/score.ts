import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail, withSpinner } from '../utils/cli.js';
import { ValidationError } from '../utils/errors.js';
import { confidenceBar, formatSigned, formatWindow, padRight, parseWindow } from '../utils/format.js';
import { getDb } from '../modules/state/db.js';
import { loadWindow } from '../modules/state/record-store.js';
import { createAlignmentScoreModel } from '../modules/state/models/alignment-scores.js';
import { loadLexiconFile } from '../modules/lexicon/loader.js';
import { loadScoringProfile } from '../modules/engine/profile.js';
import { scoreWindow } from '../modules/engine/alignment-engine.js';
import { classifyScore } from '../modules/aggregate/labels.js';

interface ScoreOptions {
  from: string;
  to: string;
  axis?: string[];
  dryRun?: boolean;
  json?: boolean;
}

export function registerScoreCommand(program: Command): void {
  program
    .command('score')
    .description('Compute alignment scores for every member active in a window')
    .requiredOption('--from <date>', 'Window start (inclusive), e.g. 2024-01-01')
    .requiredOption('--to <date>', 'Window end (exclusive), e.g. 2024-07-01')
    .option('--axis <name...>', 'Only score these axes')
    .option('--dry-run', 'Compute and print without storing a new version')
    .option('--json', 'Output as JSON')
    .action(async (opts: ScoreOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const window = parseWindow(opts.from, opts.to);
        const lexicon = loadLexiconFile(config.lexiconPath);
        const profile = loadScoringProfile(config.scoringProfilePath);

        const unknownAxes = (opts.axis ?? []).filter(a => !(a in profile.axes));
        if (unknownAxes.length > 0) {
          throw new ValidationError(
            'Unknown axis',
            unknownAxes.map(a => ({ path: 'axis', message: `"${a}" is not in the scoring profile` })),
          );
        }

        const db = getDb(config.dbPath);
        const spinner = opts.json ? null : ora(`Scoring ${formatWindow(window)}...`).start();
        const run = withSpinner(spinner, 'Scoring failed', () => {
          const result = scoreWindow(loadWindow(db, window), profile, lexicon, { window, axes: opts.axis });
          if (!opts.dryRun && result.scores.length > 0) {
            createAlignmentScoreModel(db).insertMany(result.scores);
          }
          return result;
        });
        spinner?.succeed(
          `Scored ${run.graph.size} members on ${run.axes.length} axis(es) ` +
            `from ${run.documents} documents and ${run.votes} votes`,
        );

        if (opts.json) {
          console.log(JSON.stringify(run.scores, null, 2));
          return;
        }

        if (run.scores.length === 0) {
          console.log(chalk.yellow('\n  No records in this window. Nothing scored.\n'));
          return;
        }

        for (const stat of run.axes) {
          const axisProfile = profile.axes[stat.axis];
          console.log(chalk.bold(`\n  Axis: ${stat.axis}`));
          console.log(
            chalk.dim(
              `  coalition: ${stat.coalitionIterations} iteration(s), ` +
                (stat.coalitionConverged ? 'converged' : 'did not converge'),
            ),
          );
          console.log(chalk.dim(`  ${padRight('member', 14)} score   confidence   text    coal.   vote    label`));

          for (const s of run.scores.filter(x => x.axis === stat.axis)) {
            const label = classifyScore(s, axisProfile);
            const color = s.confidence === 0 ? chalk.dim : s.value > 0 ? chalk.red : s.value < 0 ? chalk.blue : chalk.white;
            console.log(
              `  ${padRight(s.memberId, 14)} ${color(formatSigned(s.value))} ${confidenceBar(s.confidence)} ` +
                `${formatSigned(s.components.text.value)} ${formatSigned(s.components.coalition.value)} ` +
                `${formatSigned(s.components.vote.value)}  ${label}`,
            );
          }
        }

        console.log(
          opts.dryRun
            ? chalk.dim('\n  Dry run: scores not stored.\n')
            : chalk.dim(`\n  Stored ${run.scores.length} score(s), lexicon ${lexicon.version}.\n`),
        );
      } catch (err) {
        fail(err);
      }
    });
}
