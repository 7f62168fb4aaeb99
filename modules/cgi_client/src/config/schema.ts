import Ajv, { type JSONSchemaType, type ValidateFunction, type ErrorObject } from 'ajv/dist/2020.js';

export interface TargetEntry {
  target: string;
  environment?: Record<string, string>;
  notes?: string;
}

export interface TargetsDocument {
  $schema?: string;
  description?: string;
  targets: Record<string, TargetEntry>;
}

const targetEntrySchema: JSONSchemaType<TargetEntry> = {
  type: 'object',
  additionalProperties: false,
  required: ['target'],
  properties: {
    target: { type: 'string', minLength: 1 },
    environment: {
      type: 'object',
      nullable: true,
      required: [],
      additionalProperties: { type: 'string' }
    },
    notes: {
      type: 'string',
      nullable: true
    }
  }
};

const targetsDocumentSchema: JSONSchemaType<TargetsDocument> = {
  type: 'object',
  required: ['targets'],
  additionalProperties: false,
  properties: {
    $schema: { type: 'string', nullable: true },
    description: { type: 'string', nullable: true },
    targets: {
      type: 'object',
      required: [],
      additionalProperties: targetEntrySchema
    }
  }
};

const ajv = new Ajv({ allErrors: true, strict: false });

export const validateTargetsDocument = ajv.compile(targetsDocumentSchema);

export type TargetsValidator = ValidateFunction<TargetsDocument>;
export type SchemaError = ErrorObject;
