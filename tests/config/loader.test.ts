/**
 * GraphQA - Configuration Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from '@jest/globals';
import { ConfigLoader, loadConfig } from '../../src/config/loader.js';
import { safeValidateConfigFile, formatValidationErrors } from '../../src/config/schema.js';
import { ConfigurationError } from '../../src/utils/types.js';

const ENV_KEYS = [
  'GRAPHQA_CONFIG_PATH',
  'SPARQL_ENDPOINT_URL',
  'SPARQL_METHOD',
  'SPARQL_USERNAME',
  'SPARQL_PASSWORD',
  'SPARQL_TIMEOUT_MS',
  'ONTOLOGY_FILE_PATH',
  'ONTOLOGY_QUERY',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_BASE_URL',
  'QA_MAX_FIX_RETRIES',
  'QA_VERBOSE',
  'LOG_LEVEL',
  'LOG_FORMAT',
  'LOG_FILE_ENABLED',
  'LOG_FILE_PATH',
];

const FULL_YAML = `endpoint:
  url: http://graphdb.test/repositories/starwars
  method: POST
  username: reader
  password: test-secret
ontology:
  source: file
  path: ./ontology/starwars.ttl
llm:
  model: gpt-test
  temperature: 0.2
qa:
  maxFixRetries: 3
  verbose: true
  prompts:
    qa: "Answer {prompt} using {context}"
logging:
  level: warn
  format: pretty
`;

describe('ConfigLoader', () => {
  let dir: string;
  const savedEnv: Record<string, string | undefined> = {};

  const writeConfig = (name: string, content: string): string => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphqa-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('load', () => {
    it('should load a YAML file', async () => {
      const file = writeConfig('full.yaml', FULL_YAML);

      const config = await new ConfigLoader(file).load();

      expect(config).toEqual({
        endpoint: {
          url: 'http://graphdb.test/repositories/starwars',
          method: 'POST',
          username: 'reader',
          password: 'test-secret',
          timeoutMs: 30000,
        },
        ontology: { source: 'file', path: './ontology/starwars.ttl' },
        llm: {
          apiKey: '',
          model: 'gpt-test',
          baseUrl: 'https://api.openai.com/v1',
          temperature: 0.2,
          maxTokens: 1000,
          timeoutMs: 30000,
        },
        qa: {
          maxFixRetries: 3,
          verbose: true,
          prompts: { qa: 'Answer {prompt} using {context}' },
        },
        logging: {
          level: 'warn',
          format: 'pretty',
          fileEnabled: false,
          filePath: './logs/graphqa.log',
        },
        configFilePath: file,
      });
    });

    it('should default maxFixRetries to 5', async () => {
      const file = writeConfig('minimal.yaml', 'ontology:\n  source: inline\n  text: "voc:Film a owl:Class ."\n');

      const config = await new ConfigLoader(file).load();

      expect(config.qa.maxFixRetries).toBe(5);
      expect(config.endpoint.method).toBe('GET');
      expect(config.ontology).toEqual({ source: 'inline', text: 'voc:Film a owl:Class .' });
    });

    it('should load a JSON file', async () => {
      const file = writeConfig(
        'config.json',
        JSON.stringify({ ontology: { source: 'query', query: 'CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }' } })
      );

      const config = await new ConfigLoader(file).load();

      expect(config.ontology.source).toBe('query');
    });

    it('should apply environment overrides', async () => {
      const file = writeConfig('env.yaml', FULL_YAML);
      process.env['SPARQL_ENDPOINT_URL'] = 'http://other.test/repositories/films';
      process.env['SPARQL_METHOD'] = 'GET';
      process.env['OPENAI_API_KEY'] = 'test-key';
      process.env['QA_MAX_FIX_RETRIES'] = '0';
      process.env['QA_VERBOSE'] = 'false';
      process.env['LOG_LEVEL'] = 'debug';

      const config = await new ConfigLoader(file).load();

      expect(config.endpoint.url).toBe('http://other.test/repositories/films');
      expect(config.endpoint.method).toBe('GET');
      expect(config.llm.apiKey).toBe('test-key');
      expect(config.qa.maxFixRetries).toBe(0);
      expect(config.qa.verbose).toBe(false);
      expect(config.logging.level).toBe('debug');
    });

    it('should reject enum overrides with unknown values', async () => {
      const file = writeConfig('enum.yaml', FULL_YAML);
      process.env['SPARQL_METHOD'] = 'PATCH';

      await expect(new ConfigLoader(file).load()).rejects.toThrow(
        "SPARQL_METHOD must be one of GET, POST, got 'PATCH'"
      );
    });

    it.each(['abc', '2.5', ''])("should reject QA_MAX_FIX_RETRIES = '%s'", async (value) => {
      const file = writeConfig('retries.yaml', FULL_YAML);
      process.env['QA_MAX_FIX_RETRIES'] = value;

      await expect(new ConfigLoader(file).load()).rejects.toThrow(
        `QA_MAX_FIX_RETRIES must be an integer, got '${value}'`
      );
    });

    it('should reject a QA_VERBOSE that is not a boolean', async () => {
      const file = writeConfig('verbose.yaml', FULL_YAML);
      process.env['QA_VERBOSE'] = 'yes please';

      await expect(new ConfigLoader(file).load()).rejects.toThrow(ConfigurationError);
    });

    it('should validate overridden values like file values', async () => {
      const file = writeConfig('invalid-env.yaml', FULL_YAML);
      process.env['SPARQL_ENDPOINT_URL'] = 'not a url';
      process.env['SPARQL_TIMEOUT_MS'] = '-5';

      await expect(new ConfigLoader(file).load()).rejects.toThrow(
        'Invalid configuration: endpoint.url: Invalid url; endpoint.timeoutMs: Number must be greater than or equal to 100'
      );
    });

    it('should let ONTOLOGY_FILE_PATH replace the configured ontology', async () => {
      const file = writeConfig('ontology.yaml', FULL_YAML);
      process.env['ONTOLOGY_FILE_PATH'] = '/data/films.nt';

      const config = await new ConfigLoader(file).load();

      expect(config.ontology).toEqual({ source: 'file', path: '/data/films.nt' });
    });

    it('should read the path from GRAPHQA_CONFIG_PATH', async () => {
      const file = writeConfig('from-env.yaml', FULL_YAML);
      process.env['GRAPHQA_CONFIG_PATH'] = file;

      const config = await loadConfig();

      expect(config.configFilePath).toBe(file);
    });

    it('should fall back to environment variables when there is no file', async () => {
      process.env['ONTOLOGY_QUERY'] = 'CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }';

      const config = await new ConfigLoader(path.join(dir, 'absent.yaml')).load();

      expect(config.ontology).toEqual({ source: 'query', query: 'CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }' });
      expect(config.endpoint.url).toBe('http://localhost:7200/repositories/graphqa');
    });

    it('should fail when no ontology is configured anywhere', async () => {
      await expect(new ConfigLoader(path.join(dir, 'absent.yaml')).load()).rejects.toThrow(
        'No ontology configured'
      );
    });

    it('should reject a negative retry budget', async () => {
      const file = writeConfig('negative.yaml', 'qa:\n  maxFixRetries: -1\nontology:\n  source: inline\n  text: x\n');

      await expect(new ConfigLoader(file).load()).rejects.toThrow(/qa\.maxFixRetries/);
    });

    it('should reject a negative retry budget from the environment', async () => {
      const file = writeConfig('env-negative.yaml', FULL_YAML);
      process.env['QA_MAX_FIX_RETRIES'] = '-2';

      await expect(new ConfigLoader(file).load()).rejects.toThrow(
        'Invalid configuration: qa.maxFixRetries: Number must be greater than or equal to 0'
      );
    });

    it('should reject an ONTOLOGY_FILE_PATH in an unsupported format', async () => {
      const file = writeConfig('env-owl.yaml', FULL_YAML);
      process.env['ONTOLOGY_FILE_PATH'] = '/data/films.owl';

      await expect(new ConfigLoader(file).load()).rejects.toThrow(/ontology\.path: Ontology file must end in one of/);
    });

    it('should reject unsupported file formats', async () => {
      const file = writeConfig('config.toml', 'x = 1');

      await expect(new ConfigLoader(file).load()).rejects.toThrow('Unsupported config file format: .toml');
    });

    it('should report YAML syntax errors as configuration errors', async () => {
      const file = writeConfig('broken.yaml', 'endpoint: [unclosed\n');

      await expect(new ConfigLoader(file).load()).rejects.toThrow(ConfigurationError);
    });
  });

  describe('getConfig', () => {
    it('should throw before load', () => {
      expect(() => new ConfigLoader(path.join(dir, 'absent.yaml')).getConfig()).toThrow(
        'Configuration not loaded. Call load() first.'
      );
    });

    it('should return the loaded configuration', async () => {
      const loader = new ConfigLoader(writeConfig('cached.yaml', FULL_YAML));
      const loaded = await loader.load();

      expect(loader.getConfig()).toBe(loaded);
    });
  });
});

describe('ConfigFileSchema', () => {
  it('should require the field matching the ontology source', () => {
    const result = safeValidateConfigFile({ ontology: { source: 'file' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        "ontology.path: 'path' is required when source is 'file'",
      ]);
    }
  });

  it('should reject ontology files in unsupported formats', () => {
    const result = safeValidateConfigFile({ ontology: { source: 'file', path: 'ontology.csv' } });

    expect(result.success).toBe(false);
  });

  it('should reject malformed endpoint URLs', () => {
    const result = safeValidateConfigFile({ endpoint: { url: 'not a url' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['endpoint.url: Invalid url']);
    }
  });
});
