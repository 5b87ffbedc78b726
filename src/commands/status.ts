import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail } from '../utils/cli.js';
import { formatIssue, ValidationError } from '../utils/errors.js';
import { getDb } from '../modules/state/db.js';
import { createMemberModel } from '../modules/state/models/members.js';
import { createDocumentModel } from '../modules/state/models/documents.js';
import { createVoteModel } from '../modules/state/models/votes.js';
import { createAlignmentScoreModel } from '../modules/state/models/alignment-scores.js';
import { loadLexiconFile } from '../modules/lexicon/loader.js';
import { loadScoringProfile } from '../modules/engine/profile.js';

function describeLoad<T>(load: () => T): { value: T | null; problem: string | null } {
  try {
    return { value: load(), problem: null };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { value: null, problem: err.issues.map(formatIssue).join('; ') || err.message };
    }
    throw err;
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Record counts, lexicon version and configured axes')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const db = getDb(config.dbPath);
        const counts = {
          members: createMemberModel(db).count(),
          documents: createDocumentModel(db).count(),
          votes: createVoteModel(db).count(),
          scores: createAlignmentScoreModel(db).count(),
        };
        const lexicon = describeLoad(() => loadLexiconFile(config.lexiconPath));
        const profile = describeLoad(() => loadScoringProfile(config.scoringProfilePath));

        if (opts.json) {
          console.log(JSON.stringify({
            dbPath: config.dbPath,
            counts,
            lexicon: lexicon.value
              ? { version: lexicon.value.version, axes: lexicon.value.axes() }
              : { error: lexicon.problem },
            profile: profile.value
              ? { axes: Object.keys(profile.value.axes).sort(), engine: profile.value.engine }
              : { error: profile.problem },
          }, null, 2));
          return;
        }

        console.log(chalk.bold('\n  Alignment Scorer — Status'));
        console.log(chalk.dim('  ═'.repeat(25)));
        console.log(chalk.bold('\n  Data'));
        console.log(`  Database:   ${chalk.dim(config.dbPath)}`);
        console.log(`  Members:    ${chalk.cyan(String(counts.members))}`);
        console.log(`  Documents:  ${chalk.cyan(String(counts.documents))}`);
        console.log(`  Votes:      ${chalk.cyan(String(counts.votes))}`);
        console.log(`  Scores:     ${chalk.cyan(String(counts.scores))} stored versions`);

        console.log(chalk.bold('\n  Configuration'));
        if (lexicon.value) {
          console.log(`  ${chalk.green('✓')} Lexicon ${lexicon.value.version}: ${lexicon.value.axes().join(', ')}`);
        } else {
          console.log(`  ${chalk.red('✗')} Lexicon: ${lexicon.problem}`);
        }
        if (profile.value) {
          const axes = Object.keys(profile.value.axes).sort();
          console.log(`  ${chalk.green('✓')} Scoring profile: ${axes.join(', ')}`);
          const e = profile.value.engine;
          console.log(chalk.dim(
            `    voteWeight ${e.voteWeight} · tolerance ${e.tolerance} · maxIterations ${e.maxIterations} · minVotes ${e.minVotes}`,
          ));
        } else {
          console.log(`  ${chalk.red('✗')} Scoring profile: ${profile.problem}`);
        }
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
