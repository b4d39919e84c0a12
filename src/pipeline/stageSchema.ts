import { TASK_CATEGORIES } from '../routing/types.js';
import { PipelineConfigurationError } from '../utils/errors.js';
import { validator } from '../utils/validators.js';
import type { PipelineDefinition, StageDescriptor } from './types.js';

const generateStageSchema = {
  type: 'object',
  required: ['kind', 'name', 'promptTemplate'],
  additionalProperties: false,
  properties: {
    kind: { const: 'generate' },
    name: { type: 'string', minLength: 1 },
    categoryHint: { enum: [...TASK_CATEGORIES] },
    promptTemplate: { type: 'string', minLength: 1 },
    systemInstruction: { type: 'string' },
    temperature: { type: 'number', minimum: 0, maximum: 2 },
    maxOutputTokens: { type: 'integer', minimum: 1 },
    timeoutMs: { type: 'integer', minimum: 0 },
  },
};

const transformStageSchema = {
  type: 'object',
  required: ['kind', 'name', 'transform'],
  properties: {
    kind: { const: 'transform' },
    name: { type: 'string', minLength: 1 },
  },
};

export const stageListSchema = {
  type: 'array',
  minItems: 1,
  items: { oneOf: [generateStageSchema, transformStageSchema] },
};

export const pipelineDefinitionSchema = {
  type: 'object',
  required: ['name', 'stages'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    stages: { type: 'array', minItems: 1, items: generateStageSchema },
  },
};

function check(schemaId: string, schema: object, data: unknown, label: string): void {
  validator.compileSchema(schemaId, schema);
  const result = validator.validate(schemaId, data);
  if (!result.valid) {
    throw new PipelineConfigurationError(
      `Invalid ${label}:\n${validator.formatErrors(result.errors)}`,
      result.errors
    );
  }
}

function assertUniqueNames(stages: ReadonlyArray<{ name: string }>): void {
  const seen = new Set<string>();
  for (const stage of stages) {
    if (seen.has(stage.name)) {
      throw new PipelineConfigurationError(`Duplicate stage name "${stage.name}"`);
    }
    seen.add(stage.name);
  }
}

/**
 * Check stage descriptors before any run: shape, unique names, callable transforms
 */
export function validateStages(stages: readonly StageDescriptor[]): void {
  check('pipeline-stages', stageListSchema, stages, 'pipeline stages');
  for (const stage of stages) {
    if (stage.kind === 'transform' && typeof stage.transform !== 'function') {
      throw new PipelineConfigurationError(`Stage "${stage.name}" has no transform function`);
    }
  }
  assertUniqueNames(stages);
}

function isPipelineDefinition(data: unknown): data is PipelineDefinition {
  check('pipeline-definition', pipelineDefinitionSchema, data, 'pipeline definition');
  return true;
}

export function parsePipelineDefinition(data: unknown): PipelineDefinition {
  if (!isPipelineDefinition(data)) {
    throw new PipelineConfigurationError('Invalid pipeline definition');
  }
  assertUniqueNames(data.stages);
  return data;
}
