/**
 * GraphQA - Ontology Schema Providers
 *
 * A schema provider hands the model a textual description of the graph's
 * classes and properties. Providers are read on every request; nothing is cached.
 */

import fs from 'fs';
import path from 'path';

import { Parser as RdfParser, Writer as RdfWriter, type Quad } from 'n3';
import { Parser as SparqlParser } from 'sparqljs';

import { errorMessage } from '../utils/helpers.js';
import { ConfigurationError } from '../utils/types.js';
import type { SparqlEndpointClient } from './client.js';

export interface SchemaProvider {
  getSchema(): Promise<string>;
}

/**
 * RDF serializations accepted for a local ontology file, by extension
 */
const ONTOLOGY_FORMATS = {
  '.ttl': 'Turtle',
  '.nt': 'N-Triples',
  '.n3': 'N3',
  '.trig': 'TriG',
  '.nq': 'N-Quads',
} as const;

type OntologyExtension = keyof typeof ONTOLOGY_FORMATS;

export const SUPPORTED_ONTOLOGY_EXTENSIONS: readonly OntologyExtension[] = ['.ttl', '.nt', '.n3', '.trig', '.nq'];

// =============================================================================
// Inline
// =============================================================================

export class StaticSchemaProvider implements SchemaProvider {
  constructor(private readonly schema: string) {}

  async getSchema(): Promise<string> {
    return this.schema;
  }
}

// =============================================================================
// Local File
// =============================================================================

export class FileSchemaProvider implements SchemaProvider {
  private readonly filePath: string;
  private readonly format: string;

  constructor(filePath: string) {
    const extension = path.extname(filePath).toLowerCase();
    const supported = SUPPORTED_ONTOLOGY_EXTENSIONS.find((candidate) => candidate === extension);
    if (supported === undefined) {
      throw new ConfigurationError(
        `Unsupported ontology file format '${extension || filePath}'. ` +
          `Expected one of: ${SUPPORTED_ONTOLOGY_EXTENSIONS.join(', ')}`
      );
    }
    this.filePath = filePath;
    this.format = ONTOLOGY_FORMATS[supported];
  }

  /**
   * Parse the file in the format its extension names and return it as Turtle
   */
  async getSchema(): Promise<string> {
    let fileData: string;
    try {
      fileData = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ConfigurationError(`Ontology file not found: ${this.filePath}`);
      }
      throw error;
    }

    const prefixes: Record<string, string> = {};
    let quads: Quad[];
    try {
      quads = new RdfParser({ format: this.format }).parse(fileData, null, (prefix, prefixNode) => {
        prefixes[prefix] = prefixNode.value;
      });
    } catch (error) {
      throw new ConfigurationError(`Invalid ontology file ${this.filePath}: ${errorMessage(error)}`);
    }

    return writeTurtle(quads, prefixes);
  }
}

// Named graphs are merged into the default graph; the model only needs the statements
function writeTurtle(quads: Quad[], prefixes: Record<string, string>): Promise<string> {
  const writer = new RdfWriter({ format: 'Turtle', prefixes });
  for (const quad of quads) {
    writer.addQuad(quad.subject, quad.predicate, quad.object);
  }
  return new Promise((resolve, reject) => {
    writer.end((error, result) => (error ? reject(error) : resolve(result)));
  });
}

// =============================================================================
// CONSTRUCT Query
// =============================================================================

export type QueryForm = 'SELECT' | 'CONSTRUCT' | 'ASK' | 'DESCRIBE';

/**
 * Parse a query and return its form, or undefined for SPARQL updates.
 * Throws ConfigurationError when the text is not valid SPARQL.
 */
export function getQueryForm(query: string): QueryForm | undefined {
  try {
    const parsed = new SparqlParser().parse(query);
    return parsed.type === 'query' ? parsed.queryType : undefined;
  } catch (error) {
    throw new ConfigurationError(`Invalid SPARQL query: ${errorMessage(error)}`);
  }
}

export class EndpointSchemaProvider implements SchemaProvider {
  constructor(
    private readonly client: Pick<SparqlEndpointClient, 'construct'>,
    private readonly ontologyQuery: string
  ) {
    if (getQueryForm(ontologyQuery) !== 'CONSTRUCT') {
      throw new ConfigurationError('The ontology query must be a CONSTRUCT query');
    }
  }

  async getSchema(): Promise<string> {
    return this.client.construct(this.ontologyQuery);
  }
}
