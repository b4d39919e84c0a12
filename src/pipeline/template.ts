import { PipelineConfigurationError } from '../utils/errors.js';

export type TemplateVars = Record<string, string>;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Placeholder names used by a template, in first-use order
 */
export function templateVariables(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Placeholders a template uses that `available` does not provide
 */
export function missingVariables(template: string, available: Iterable<string>): string[] {
  const provided = new Set(available);
  return templateVariables(template).filter((name) => !provided.has(name));
}

/**
 * Substitute `{name}` placeholders in one pass
 *
 * Substituted values are not rescanned, so braces inside document text
 * stay as they are.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
    if (!Object.hasOwn(vars, name)) {
      throw new PipelineConfigurationError(`Template variable "${name}" has no value`, { placeholder });
    }
    return vars[name];
  });
}
