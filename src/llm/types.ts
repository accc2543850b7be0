/**
 * GraphQA - Language Model Types
 */

/**
 * A text-in, text-out language model
 */
export interface LanguageModel {
  complete(prompt: string): Promise<string>;
}

export type PromptVariables = Record<string, string>;
