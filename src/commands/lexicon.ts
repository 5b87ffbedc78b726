import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { fail } from '../utils/cli.js';
import { formatSigned } from '../utils/format.js';
import { loadLexiconFile } from '../modules/lexicon/loader.js';
import { scoreText } from '../modules/text/text-scorer.js';

export function registerLexiconCommand(program: Command): void {
  const lexicon = program.command('lexicon').description('Inspect axis lexicons');

  lexicon
    .command('check')
    .description('Validate a lexicon file and list its axes')
    .option('--file <path>', 'Lexicon file (defaults to LEXICON_PATH)')
    .action(async (opts: { file?: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const file = opts.file ?? config.lexiconPath;
        const store = loadLexiconFile(file);
        console.log(chalk.green(`\n  ✓ ${file}`));
        console.log(`  Version: ${chalk.cyan(store.version)}`);
        for (const axis of store.axes()) {
          console.log(`  ${axis}: ${chalk.cyan(String(store.size(axis)))} terms, longest ${store.maxNgram(axis)} token(s)`);
        }
        console.log('');
      } catch (err) {
        fail(err);
      }
    });

  lexicon
    .command('test')
    .description('Score a piece of text on every axis')
    .argument('<text>', 'Text to score')
    .option('--file <path>', 'Lexicon file (defaults to LEXICON_PATH)')
    .action(async (text: string, opts: { file?: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      try {
        const store = loadLexiconFile(opts.file ?? config.lexiconPath);
        for (const axis of store.axes()) {
          const result = scoreText(text, axis, store);
          console.log(
            `\n  ${chalk.bold(axis)}: ${formatSigned(result.score)}  ` +
              chalk.dim(`coverage ${(result.coverage * 100).toFixed(1)}% (${result.matchedTokens}/${result.totalTokens})`),
          );
          if (result.matchedTerms.length > 0) {
            console.log(chalk.dim(`  matched: ${result.matchedTerms.join(', ')}`));
          }
        }
        console.log('');
      } catch (err) {
        fail(err);
      }
    });
}
