/**
 * GraphQA - Prompt Chain
 *
 * Renders a prompt template and passes it to a language model. Generation,
 * repair and answering all go through the same invoke() contract and differ
 * only in their template and variables.
 */

import { PromptTemplate } from './prompt.js';
import type { LanguageModel, PromptVariables } from './types.js';

export const DEFAULT_OUTPUT_KEY = 'text';

export interface PromptChainOptions {
  outputKey?: string;
}

export class PromptChain {
  readonly prompt: PromptTemplate;
  readonly outputKey: string;
  private readonly model: LanguageModel;

  constructor(model: LanguageModel, prompt: PromptTemplate | string, options: PromptChainOptions = {}) {
    this.model = model;
    this.prompt = typeof prompt === 'string' ? new PromptTemplate(prompt) : prompt;
    this.outputKey = options.outputKey ?? DEFAULT_OUTPUT_KEY;
  }

  async invoke(variables: PromptVariables): Promise<Record<string, string>> {
    const text = await this.model.complete(this.prompt.format(variables));
    return { [this.outputKey]: text };
  }

  /**
   * invoke() and return the output value directly
   */
  async run(variables: PromptVariables): Promise<string> {
    const result = await this.invoke(variables);
    return result[this.outputKey] ?? '';
  }
}
