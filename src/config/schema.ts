/**
 * GraphQA - Configuration Schema
 * Zod-based validation schemas for the configuration file
 */

import { z } from 'zod';

import { SUPPORTED_ONTOLOGY_EXTENSIONS } from '../graph/schema.js';

// =============================================================================
// Endpoint Configuration Schema
// =============================================================================

export const EndpointConfigSchema = z.object({
  url: z.string().url().default('http://localhost:7200/repositories/graphqa'),
  method: z.enum(['GET', 'POST']).default('GET'),
  username: z.string().optional(),
  password: z.string().optional(),
  timeoutMs: z.number().int().min(100).default(30000),
});

// =============================================================================
// Ontology Configuration Schema
// =============================================================================

export const OntologyConfigSchema = z
  .object({
    source: z.enum(['inline', 'file', 'query']).default('file'),
    text: z.string().optional(),
    path: z
      .string()
      .refine(
        (value) => SUPPORTED_ONTOLOGY_EXTENSIONS.some((extension) => value.toLowerCase().endsWith(extension)),
        { message: `Ontology file must end in one of: ${SUPPORTED_ONTOLOGY_EXTENSIONS.join(', ')}` }
      )
      .optional(),
    query: z.string().optional(),
  })
  .superRefine((ontology, ctx) => {
    const required = { inline: 'text', file: 'path', query: 'query' } as const;
    const key = required[ontology.source];
    if (ontology[key] === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key],
        message: `'${key}' is required when source is '${ontology.source}'`,
      });
    }
  });

// =============================================================================
// Language Model Configuration Schema
// =============================================================================

export const LLMConfigSchema = z.object({
  apiKey: z.string().default(''),
  model: z.string().min(1).default('gpt-4o-mini'),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  temperature: z.number().min(0).max(2).default(0),
  maxTokens: z.number().int().min(1).default(1000),
  timeoutMs: z.number().int().min(100).default(30000),
});

// =============================================================================
// QA Configuration Schema
// =============================================================================

export const PromptOverridesSchema = z.object({
  sparqlGeneration: z.string().min(1).optional(),
  sparqlFix: z.string().min(1).optional(),
  qa: z.string().min(1).optional(),
});

export const QAConfigSchema = z.object({
  maxFixRetries: z.number().int().min(0).default(5),
  verbose: z.boolean().default(false),
  prompts: PromptOverridesSchema.default({}),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/graphqa.log'),
});

// =============================================================================
// Complete Configuration File Schema
// =============================================================================

export const ConfigFileSchema = z.object({
  endpoint: EndpointConfigSchema.partial().optional(),
  ontology: OntologyConfigSchema.optional(),
  llm: LLMConfigSchema.partial().optional(),
  qa: QAConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

/**
 * A fully merged configuration: file values with environment overrides applied
 */
export const ResolvedConfigSchema = z.object({
  endpoint: EndpointConfigSchema,
  ontology: OntologyConfigSchema,
  llm: LLMConfigSchema,
  qa: QAConfigSchema,
  logging: LoggingConfigSchema,
});

// =============================================================================
// Type Exports
// =============================================================================

export type EndpointConfigInput = z.input<typeof EndpointConfigSchema>;
export type EndpointConfigOutput = z.output<typeof EndpointConfigSchema>;

export type OntologyConfigInput = z.input<typeof OntologyConfigSchema>;
export type OntologyConfigOutput = z.output<typeof OntologyConfigSchema>;

export type LLMConfigInput = z.input<typeof LLMConfigSchema>;
export type LLMConfigOutput = z.output<typeof LLMConfigSchema>;

export type QAConfigInput = z.input<typeof QAConfigSchema>;
export type QAConfigOutput = z.output<typeof QAConfigSchema>;

export type LoggingConfigInput = z.input<typeof LoggingConfigSchema>;
export type LoggingConfigOutput = z.output<typeof LoggingConfigSchema>;

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

export type ResolvedConfigInput = z.input<typeof ResolvedConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Validate a configuration file object
 * @throws ZodError if validation fails
 */
export function validateConfigFile(config: unknown): ConfigFileOutput {
  return ConfigFileSchema.parse(config);
}

/**
 * Safely validate a configuration file object
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
