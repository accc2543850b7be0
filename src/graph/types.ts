/**
 * GraphQA - Graph Endpoint Types
 *
 * Shapes follow the SPARQL 1.1 Query Results JSON Format.
 */

export type SparqlTermType = 'uri' | 'literal' | 'bnode' | 'triple';

export interface SparqlValueTerm {
  type: 'uri' | 'literal' | 'bnode';
  value: string;
  datatype?: string;
  'xml:lang'?: string;
}

/**
 * A quoted triple (SPARQL-star). Its value is the triple, not a string.
 */
export interface SparqlTripleTerm {
  type: 'triple';
  value: {
    subject: SparqlTerm;
    predicate: SparqlTerm;
    object: SparqlTerm;
  };
}

export type SparqlTerm = SparqlValueTerm | SparqlTripleTerm;

export type SparqlBinding = Record<string, SparqlTerm>;

export interface SparqlResultSet {
  /** Projected variable names from the result head */
  variables: string[];

  /** One binding map per solution row, in endpoint order */
  bindings: SparqlBinding[];

  /** Present for ASK queries */
  boolean?: boolean;
}

/**
 * Anything that can execute a SPARQL query in a single call
 */
export interface GraphEndpoint {
  execute(query: string): Promise<SparqlResultSet>;
}
