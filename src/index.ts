import { Command } from 'commander';
import { registerIngestCommand } from './commands/ingest.js';
import { registerScoreCommand } from './commands/score.js';
import { registerScoresCommand } from './commands/scores.js';
import { registerCompareCommand } from './commands/compare.js';
import { registerPartiesCommand } from './commands/parties.js';
import { registerLexiconCommand } from './commands/lexicon.js';
import { registerStatusCommand } from './commands/status.js';

const program = new Command();

program
  .name('alignment')
  .description('Score legislators on political axes from bill text, co-sponsorship and roll-call votes')
  .version('0.1.0');

registerIngestCommand(program);
registerScoreCommand(program);
registerScoresCommand(program);
registerCompareCommand(program);
registerPartiesCommand(program);
registerLexiconCommand(program);
registerStatusCommand(program);

export function run(): void {
  program.parse();
}

// Direct execution (when run via tsx, not via the bin entry point)
const isBinEntry = process.argv[1]?.endsWith('alignment.mjs');
if (!isBinEntry) {
  run();
}
