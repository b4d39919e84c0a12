import fs from 'fs';
import { parsePipelineDefinition } from '../pipeline/stageSchema.js';
import type { PipelineDefinition } from '../pipeline/types.js';
import { ConfigurationError } from '../utils/errors.js';
import { configPath } from './paths.js';

/**
 * Bundled pipeline presets under config/pipelines/
 */
export const PIPELINE_PRESETS = ['legal-analysis', 'document-qa'] as const;

export type PipelinePreset = (typeof PIPELINE_PRESETS)[number];

/**
 * Load a pipeline definition by preset name or from an explicit file
 */
export function loadPipeline(nameOrPath: PipelinePreset | string): PipelineDefinition {
  const filePath = nameOrPath.endsWith('.json') ? nameOrPath : configPath('pipelines', `${nameOrPath}.json`);

  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Pipeline definition not found: ${filePath}`);
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parsePipelineDefinition(raw);
}
