import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger, getLogger } from '../utils/logger.js';
import { fail, parseIntOption } from '../utils/cli.js';
import { confidenceBar, formatSigned, formatWindow, padRight } from '../utils/format.js';
import { getDb } from '../modules/state/db.js';
import {
  createAlignmentScoreModel,
  type StoredAlignmentScore,
} from '../modules/state/models/alignment-scores.js';
import { classifyScore } from '../modules/aggregate/labels.js';
import { loadScoringProfile, type ScoringProfile } from '../modules/engine/profile.js';

interface ScoresOptions {
  member?: string;
  axis?: string;
  history?: boolean;
  limit: string;
  json?: boolean;
}

function tryLoadProfile(path: string): ScoringProfile | null {
  try {
    return loadScoringProfile(path);
  } catch (err) {
    getLogger().debug({ err }, 'No usable scoring profile, using default labels');
    return null;
  }
}

export function printScoreLine(s: StoredAlignmentScore, profile: ScoringProfile | null): void {
  const label = classifyScore(s, profile?.axes[s.axis]);
  console.log(
    `  ${padRight(s.memberId, 14)} ${padRight(s.axis, 12)} ${formatSigned(s.value)} ${confidenceBar(s.confidence)} ` +
      `${chalk.dim(formatWindow(s.window))}  ${label}`,
  );
}

export function registerScoresCommand(program: Command): void {
  program
    .command('scores')
    .description('List stored alignment scores (latest version per member, axis and window)')
    .option('--member <id>', 'Only this member')
    .option('--axis <name>', 'Only this axis')
    .option('--history', 'Every stored version for --member, newest first')
    .option('--limit <n>', 'Max versions with --history', '20')
    .option('--json', 'Output as JSON')
    .action(async (opts: ScoresOptions) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const db = getDb(config.dbPath);
        const model = createAlignmentScoreModel(db);
        const profile = tryLoadProfile(config.scoringProfilePath);

        if (opts.history) {
          if (!opts.member) {
            console.error(chalk.red('Error: --history needs --member <id>.'));
            process.exit(1);
          }
          const versions = model.history(opts.member, opts.axis, parseIntOption(opts.limit, 'limit'));
          if (opts.json) {
            console.log(JSON.stringify(versions, null, 2));
            return;
          }
          console.log(chalk.bold(`\n  Score history for ${opts.member}`));
          console.log(chalk.dim('  ═'.repeat(25)));
          for (const v of versions) {
            console.log(chalk.dim(`\n  computed ${v.computedAt.toISOString()} · lexicon ${v.lexiconVersion}`));
            printScoreLine(v, profile);
          }
          if (versions.length === 0) console.log(chalk.yellow('  No stored scores.'));
          console.log('');
          return;
        }

        const latest = model.latest({ memberIds: opts.member ? [opts.member] : undefined, axis: opts.axis });
        if (opts.json) {
          console.log(JSON.stringify(latest, null, 2));
          return;
        }
        if (latest.length === 0) {
          console.log(chalk.yellow('\n  No stored scores. Run `score --from <date> --to <date>` first.\n'));
          return;
        }
        console.log(chalk.bold('\n  Latest Alignment Scores'));
        console.log(chalk.dim('  ═'.repeat(25)));
        for (const s of latest) printScoreLine(s, profile);
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
