import type { Identifier } from '../types';

export type InClauseSource =
  | { kind: 'identifiers'; values: Iterable<Identifier> }
  | { kind: 'strings'; values: Iterable<string> };

export function identifierList(values: Iterable<Identifier>): InClauseSource {
  return { kind: 'identifiers', values };
}

export function stringList(values: Iterable<string>): InClauseSource {
  return { kind: 'strings', values };
}

/**
 * Render the literal list of an IN predicate, e.g. `('a', 'b')`.
 *
 * Single quotes are doubled; blank and repeated values are skipped.
 * No other escaping happens: the fragment is only safe inside a
 * standard single-quoted SQL literal context.
 */
export function formatInClause(source: InClauseSource): string {
  const literals = new Set<string>();

  for (const value of source.values) {
    const text = String(value);
    if (text.trim() === '') continue;
    literals.add(`'${text.replace(/'/g, "''")}'`);
  }

  return `(${Array.from(literals).join(', ')})`;
}

/**
 * Two-input form: a non-empty identifier input wins over the string input.
 * Empty or missing inputs produce `()`, which matches nothing.
 */
export function buildInClause(
  identifiers?: Iterable<Identifier> | null,
  strings?: Iterable<string> | null
): string {
  if (identifiers) {
    const values = Array.from(identifiers);
    if (values.length > 0) {
      return formatInClause(identifierList(values));
    }
  }

  return formatInClause(stringList(strings ?? []));
}
