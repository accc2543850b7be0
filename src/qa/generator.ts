/**
 * GraphQA - Query and Answer Generators
 *
 * Thin wrappers that give the three prompt chains their variable names.
 * Model failures propagate unchanged; nothing here retries.
 */

import type { PromptChain } from '../llm/chain.js';

export class QueryGenerator {
  constructor(
    private readonly generationChain: PromptChain,
    private readonly fixChain: PromptChain
  ) {}

  /**
   * Produce the initial candidate query
   */
  async generate(question: string, schema: string): Promise<string> {
    return this.generationChain.run({ prompt: question, schema });
  }

  /**
   * Ask for a corrected query given the endpoint's error message
   */
  async repair(failedQuery: string, errorMessage: string, schema: string): Promise<string> {
    return this.fixChain.run({
      generated_sparql: failedQuery,
      error_message: errorMessage,
      schema,
    });
  }
}

export class AnswerGenerator {
  constructor(private readonly qaChain: PromptChain) {}

  async answer(question: string, formattedResults: string): Promise<string> {
    return this.qaChain.run({ prompt: question, context: formattedResults });
  }
}
