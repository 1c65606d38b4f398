import fs from 'node:fs';
import path from 'node:path';

import {
  ConfigError,
  ParseError,
  TypeMetadataTable,
  createInputValidator,
  type Entity,
  type TypeMetadata,
} from '@nsmap/core';

const stringMap = {
  type: 'object',
  additionalProperties: { type: 'string', minLength: 1 },
} as const;

const DOCUMENT_SCHEMA = {
  definitions: {
    entity: {
      type: 'object',
      required: ['type'],
      properties: {
        type: { type: 'string', minLength: 1 },
        inputNamespaces: stringMap,
        inputSchemaLocations: stringMap,
        children: { type: 'array', items: { $ref: '#/definitions/entity' } },
      },
    },
  },
  anyOf: [
    { $ref: '#/definitions/entity' },
    { type: 'array', items: { $ref: '#/definitions/entity' } },
  ],
};

const TYPE_TABLE_SCHEMA = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    additionalProperties: false,
    properties: {
      namespace: { type: 'string', minLength: 1 },
      prefix: { type: 'string', minLength: 1, pattern: '^[^:\\s]+$' },
      qualifiedName: { type: 'string', minLength: 1 },
    },
  },
};

const validateDocument = createInputValidator<Entity | Entity[]>(
  DOCUMENT_SCHEMA,
  'document'
);

const validateTypeTable = createInputValidator<Record<string, TypeMetadata>>(
  TYPE_TABLE_SCHEMA,
  'type table'
);

/** Read and parse a JSON file given relative to the working directory. */
export function readJsonFile(file: string): unknown {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `File not found: ${abs}`,
      context: { input: abs },
    });
  }
  const raw = fs.readFileSync(abs, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ParseError({
      message: `${abs} is not valid JSON`,
      context: { input: abs },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/** One root entity, or an array of sub-document roots resolved together. */
export function loadDocument(file: string): Entity | Entity[] {
  return validateDocument(readJsonFile(file));
}

export function loadTypeTable(file: string): TypeMetadataTable {
  return TypeMetadataTable.from(validateTypeTable(readJsonFile(file)));
}
