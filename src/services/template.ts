/**
 * Task template loading and system prompt rendering.
 */

import { readFile } from 'fs/promises';
import { TemplateError } from '../types/errors.js';

/**
 * Placeholder the schema snapshot is substituted into.
 */
export const SCHEMA_PLACEHOLDER = '{db_schema}';

/**
 * Read the task template from disk.
 *
 * @throws TemplateError if the file is missing or has no schema placeholder
 */
export async function loadTaskTemplate(templatePath: string): Promise<string> {
  let template: string;
  try {
    template = await readFile(templatePath, 'utf-8');
  } catch (error) {
    throw new TemplateError(`Task template not found at ${templatePath}: ${error}`);
  }

  if (!template.includes(SCHEMA_PLACEHOLDER)) {
    throw new TemplateError(
      `Task template ${templatePath} does not contain the ${SCHEMA_PLACEHOLDER} placeholder`
    );
  }
  return template;
}

/**
 * Build the system prompt by substituting the schema verbatim.
 */
export function renderSystemPrompt(template: string, schema: string): string {
  return template.split(SCHEMA_PLACEHOLDER).join(schema);
}
