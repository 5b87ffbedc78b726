import crypto from 'node:crypto';
import { ValidationError, type ValidationIssue } from '../../utils/errors.js';
import { termKey, tokenize } from '../text/tokenizer.js';

export interface LexiconEntry {
  term: string;
  weight: number;
}

/**
 * axis → entries. Duplicate keys in the object form are caught when the JSON
 * text is parsed (see parseLexiconText); duplicates after normalisation are
 * caught here.
 */
export type LexiconSource = Record<string, Record<string, number> | LexiconEntry[]>;

export interface LexiconConfig {
  version?: string;
  axes: LexiconSource;
}

interface AxisTable {
  terms: ReadonlyMap<string, number>;
  maxNgram: number;
}

/**
 * Immutable, versioned set of axis lexicons. Built only through
 * {@link LexiconStore.load}, which validates every entry before anything
 * becomes queryable.
 */
export class LexiconStore {
  readonly version: string;
  private readonly tables: ReadonlyMap<string, AxisTable>;

  private constructor(version: string, tables: Map<string, AxisTable>) {
    this.version = version;
    this.tables = tables;
    Object.freeze(this);
  }

  static load(config: LexiconConfig): LexiconStore {
    const issues: ValidationIssue[] = [];
    const tables = new Map<string, AxisTable>();

    for (const axis of Object.keys(config.axes).sort()) {
      const source = config.axes[axis] ?? {};
      const entries: LexiconEntry[] = Array.isArray(source)
        ? source
        : Object.entries(source).map(([term, weight]) => ({ term, weight }));

      if (!axis.trim()) {
        issues.push({ path: 'axes', message: 'Axis name must not be empty' });
        continue;
      }

      const terms = new Map<string, number>();
      const origin = new Map<string, string>();
      let maxNgram = 0;

      for (const { term, weight } of entries) {
        const path = `axes.${axis}.${term}`;
        if (typeof weight !== 'number' || !Number.isFinite(weight)) {
          issues.push({ path, message: 'Weight must be a finite number' });
          continue;
        }
        if (weight < -1 || weight > 1) {
          issues.push({ path, message: `Weight ${weight} is outside [-1, 1]` });
          continue;
        }
        const tokens = tokenize(term);
        if (tokens.length === 0) {
          issues.push({ path, message: 'Term has no word characters' });
          continue;
        }
        const key = termKey(tokens);
        const first = origin.get(key);
        if (first !== undefined) {
          issues.push({ path, message: `Duplicate term (same as "${first}")` });
          continue;
        }
        origin.set(key, term);
        terms.set(key, weight);
        maxNgram = Math.max(maxNgram, tokens.length);
      }

      tables.set(axis, { terms, maxNgram });
    }

    if (issues.length > 0) {
      throw new ValidationError('Invalid lexicon', issues);
    }

    return new LexiconStore(config.version ?? contentVersion(tables), tables);
  }

  axes(): string[] {
    return [...this.tables.keys()];
  }

  hasAxis(axis: string): boolean {
    return this.tables.has(axis);
  }

  /** Weight for a normalised term (tokens joined by single spaces). */
  lookup(axis: string, term: string): number | undefined {
    return this.tables.get(axis)?.terms.get(term);
  }

  /** Longest entry on the axis, in tokens. 0 for an unknown or empty axis. */
  maxNgram(axis: string): number {
    return this.tables.get(axis)?.maxNgram ?? 0;
  }

  size(axis: string): number {
    return this.tables.get(axis)?.terms.size ?? 0;
  }
}

function contentVersion(tables: ReadonlyMap<string, AxisTable>): string {
  const hash = crypto.createHash('sha256');
  for (const [axis, table] of tables) {
    hash.update(`${axis}\n`);
    for (const term of [...table.terms.keys()].sort()) {
      hash.update(`${term}\t${table.terms.get(term)}\n`);
    }
  }
  return `sha256:${hash.digest('hex').slice(0, 12)}`;
}
