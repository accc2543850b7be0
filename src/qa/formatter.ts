/**
 * GraphQA - Result Formatter
 *
 * Consumers of the QA prompt expect one single-key object per bound variable,
 * not one object per row: [{"a":"1","b":"2"}] becomes [{"a":"1"},{"b":"2"}].
 */

import type { SparqlResultSet, SparqlTerm } from '../graph/types.js';

export type FlatBinding = Record<string, string>;

/**
 * Plain values stay bare. Quoted triples are written in Turtle-star form,
 * with their inner terms in N-Triples syntax.
 */
export function termToString(term: SparqlTerm): string {
  if (term.type !== 'triple') {
    return term.value;
  }
  const { subject, predicate, object } = term.value;
  return `<< ${innerTerm(subject)} ${innerTerm(predicate)} ${innerTerm(object)} >>`;
}

function innerTerm(term: SparqlTerm): string {
  switch (term.type) {
    case 'uri':
      return `<${term.value}>`;
    case 'bnode':
      return `_:${term.value}`;
    case 'literal': {
      const lexical = JSON.stringify(term.value);
      if (term['xml:lang'] !== undefined) {
        return `${lexical}@${term['xml:lang']}`;
      }
      return term.datatype !== undefined ? `${lexical}^^<${term.datatype}>` : lexical;
    }
    case 'triple':
      return termToString(term);
  }
}

export function flattenBindings(results: Pick<SparqlResultSet, 'bindings'>): FlatBinding[] {
  return results.bindings.flatMap((row) =>
    Object.entries(row).map(([variable, term]) => ({ [variable]: termToString(term) }))
  );
}

export function formatQueryResults(results: Pick<SparqlResultSet, 'bindings'>): string {
  return JSON.stringify(flattenBindings(results));
}
