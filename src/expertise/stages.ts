import fs from 'fs';
import { configPath } from '../config/paths.js';
import { TASK_CATEGORIES } from '../routing/types.js';
import { PipelineConfigurationError } from '../utils/errors.js';
import { validator } from '../utils/validators.js';
import type { AnalysisStage, PromptAnalysisStage } from './types.js';

/**
 * Template variables available to prompt analysis stages
 */
export const ANALYSIS_VARIABLES = ['text', 'number', 'title', 'type', 'path', 'checklist'] as const;

const promptStageSchema = {
  type: 'object',
  required: ['kind', 'name', 'promptTemplate'],
  additionalProperties: false,
  properties: {
    kind: { const: 'prompt' },
    name: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    promptTemplate: { type: 'string', minLength: 1 },
    systemInstruction: { type: 'string' },
    categoryHint: { enum: [...TASK_CATEGORIES] },
    temperature: { type: 'number', minimum: 0, maximum: 2 },
    maxOutputTokens: { type: 'integer', minimum: 1 },
    timeoutMs: { type: 'integer', minimum: 0 },
  },
};

const customStageSchema = {
  type: 'object',
  required: ['kind', 'name', 'analyze'],
  properties: {
    kind: { const: 'custom' },
    name: { type: 'string', minLength: 1 },
    title: { type: 'string' },
  },
};

const analysisStagesSchema = {
  type: 'array',
  minItems: 1,
  items: { oneOf: [promptStageSchema, customStageSchema] },
};

const stageFileSchema = {
  type: 'object',
  required: ['stages'],
  additionalProperties: false,
  properties: {
    stages: { type: 'array', minItems: 1, items: promptStageSchema },
  },
};

function check(schemaId: string, schema: object, data: unknown, label: string): void {
  validator.compileSchema(schemaId, schema);
  const result = validator.validate(schemaId, data);
  if (!result.valid) {
    throw new PipelineConfigurationError(`Invalid ${label}:\n${validator.formatErrors(result.errors)}`, result.errors);
  }
}

/**
 * Shape, unique names and callable custom stages
 */
export function validateAnalysisStages(stages: readonly AnalysisStage[]): void {
  check('analysis-stages', analysisStagesSchema, stages, 'analysis stages');

  const seen = new Set<string>();
  for (const stage of stages) {
    if (stage.kind === 'custom' && typeof stage.analyze !== 'function') {
      throw new PipelineConfigurationError(`Stage "${stage.name}" has no analyze function`);
    }
    if (seen.has(stage.name)) {
      throw new PipelineConfigurationError(`Duplicate stage name "${stage.name}"`);
    }
    seen.add(stage.name);
  }
}

function isStageFile(data: unknown): data is { stages: PromptAnalysisStage[] } {
  check('expertise-stage-file', stageFileSchema, data, 'expertise stage file');
  return true;
}

/**
 * Load prompt stages from JSON (default: config/expertise-stages.json)
 */
export function loadExpertiseStages(filePath: string = configPath('expertise-stages.json')): PromptAnalysisStage[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!isStageFile(raw)) {
    throw new PipelineConfigurationError(`Invalid expertise stage file: ${filePath}`);
  }
  validateAnalysisStages(raw.stages);
  return raw.stages;
}
