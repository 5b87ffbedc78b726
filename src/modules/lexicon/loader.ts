import fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { ValidationError, toValidationIssues } from '../../utils/errors.js';
import { parseJsonStrict } from '../../utils/json.js';
import { LexiconStore } from './lexicon-store.js';

const log = getLogger();

const LexiconEntrySchema = z.object({ term: z.string(), weight: z.number() });

export const LexiconFileSchema = z.object({
  version: z.string().min(1).optional(),
  axes: z.record(
    z.string(),
    z.union([z.record(z.string(), z.number()), z.array(LexiconEntrySchema)]),
  ),
});

export type LexiconFile = z.infer<typeof LexiconFileSchema>;

/** Parse already-decoded JSON into a store. All-or-nothing. */
export function parseLexicons(raw: unknown): LexiconStore {
  const parsed = LexiconFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Invalid lexicon file', toValidationIssues(parsed.error.issues));
  }
  return LexiconStore.load(parsed.data);
}

/** Parse lexicon JSON text. A term repeated as an object key is rejected, not overwritten. */
export function parseLexiconText(text: string): LexiconStore {
  return parseLexicons(parseJsonStrict(text, 'lexicon file'));
}

export function loadLexiconFile(filePath: string): LexiconStore {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Could not read lexicon file ${filePath}`, [
      { path: '', message: err instanceof Error ? err.message : String(err) },
    ]);
  }

  const store = parseLexiconText(text);
  log.info(
    { filePath, version: store.version, axes: store.axes().map(a => `${a}:${store.size(a)}`) },
    'Lexicons loaded',
  );
  return store;
}
