import type { AnySchema } from 'ajv';

export interface NamespaceDefinition {
  namespace: string;
  prefix: string;
  schemaLocation?: string;
}

export interface VocabularyDefinition {
  name: string;
  /** XML infrastructure namespaces never expect a schema location. */
  infrastructure?: boolean;
  namespaces: NamespaceDefinition[];
}

export interface VocabularyFile {
  /** prefix -> namespace, declared in every output document */
  baseline?: Record<string, string>;
  vocabularies: VocabularyDefinition[];
}

const prefixSchema = {
  type: 'string',
  minLength: 1,
  pattern: '^[^:\\s]+$',
} as const;

export const VOCABULARY_FILE_SCHEMA: AnySchema = {
  type: 'object',
  additionalProperties: false,
  required: ['vocabularies'],
  properties: {
    baseline: {
      type: 'object',
      propertyNames: prefixSchema,
      additionalProperties: { type: 'string', minLength: 1 },
    },
    vocabularies: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['name', 'namespaces'],
        properties: {
          name: { type: 'string', minLength: 1 },
          infrastructure: { type: 'boolean' },
          namespaces: {
            type: 'array',
            items: {
              type: 'object',
              additionalProperties: false,
              required: ['namespace', 'prefix'],
              properties: {
                namespace: { type: 'string', minLength: 1 },
                prefix: prefixSchema,
                schemaLocation: { type: 'string', minLength: 1 },
              },
            },
          },
        },
      },
    },
  },
};
