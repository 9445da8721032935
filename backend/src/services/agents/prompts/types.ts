/**
 * Prompt templates
 */

export interface PromptTemplate {
  /** `{role}-{purpose}-v{n}`, recorded as `promptId` on model call logs */
  id: string;
  /** Text with `{name}` placeholders */
  template: string;
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Substitute `{name}` placeholders; unknown placeholders are left as written
 */
export function fillTemplate(template: PromptTemplate, variables: Record<string, string>): string {
  return template.template.replace(PLACEHOLDER, (match: string, name: string) =>
    Object.hasOwn(variables, name) ? String(variables[name]) : match
  );
}
