import jsonc from 'jsonc-parser';
import { ValidationError, type ValidationIssue } from './errors.js';

/**
 * Keys repeated inside one JSON object. `JSON.parse` keeps only the last of
 * them, so these have to be found on the raw text.
 */
export function findDuplicateKeys(text: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const open: Array<Set<string>> = [];

  jsonc.visit(
    text,
    {
      onObjectBegin: () => {
        open.push(new Set());
      },
      onObjectEnd: () => {
        open.pop();
      },
      onObjectProperty: (property, _offset, _length, startLine, _startCharacter, pathSupplier) => {
        const keys = open[open.length - 1];
        if (!keys) return;
        if (keys.has(property)) {
          issues.push({
            path: [...pathSupplier(), property].join('.'),
            message: `Duplicate key "${property}" (line ${startLine + 1})`,
          });
        }
        keys.add(property);
      },
    },
    { disallowComments: true },
  );

  return issues;
}

/** Parse JSON text, rejecting syntax errors and duplicate keys with a ValidationError. */
export function parseJsonStrict(text: string, what: string): unknown {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Invalid ${what}`, [
      { path: '', message: err instanceof Error ? err.message : String(err) },
    ]);
  }

  const duplicates = findDuplicateKeys(text);
  if (duplicates.length > 0) {
    throw new ValidationError(`Invalid ${what}`, duplicates);
  }
  return raw;
}
