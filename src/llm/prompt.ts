/**
 * GraphQA - Prompt Templates
 *
 * Templates use `{name}` placeholders. A doubled brace (`{{` or `}}`) renders
 * as a literal brace so prompts can contain SPARQL group patterns.
 */

import { PromptTemplateError } from '../utils/types.js';
import type { PromptVariables } from './types.js';

const PLACEHOLDER = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class PromptTemplate {
  readonly template: string;
  readonly inputVariables: readonly string[];

  constructor(template: string) {
    this.template = template;
    this.inputVariables = PromptTemplate.extractVariables(template);
  }

  static extractVariables(template: string): string[] {
    const names = new Set<string>();
    for (const match of template.matchAll(PLACEHOLDER)) {
      if (match[1] !== undefined) {
        names.add(match[1]);
      }
    }
    return [...names];
  }

  /**
   * Render the template. Every input variable must be supplied.
   */
  format(values: PromptVariables): string {
    const missing = this.inputVariables.filter((name) => values[name] === undefined);
    if (missing.length > 0) {
      throw new PromptTemplateError(
        `Missing value for prompt variable(s): ${missing.join(', ')}`,
        missing
      );
    }

    return this.template.replace(PLACEHOLDER, (token: string, name: string | undefined) => {
      if (name === undefined) {
        return token === '{{' ? '{' : '}';
      }
      return values[name] ?? '';
    });
  }
}
