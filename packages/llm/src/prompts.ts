/**
 * Prompt template utilities for consistent LLM interactions.
 */

export interface PromptTemplate {
  system?: string;
  template: string;
  variables: string[];
}

const VARIABLE_PATTERN = /\{(\w+)\}/g;

/**
 * Substitute `{name}` placeholders in one pass. Substituted text is never
 * re-scanned, so values may themselves contain braces or `$` sequences.
 * Unknown placeholders are left as they are.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(VARIABLE_PATTERN, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match,
  );
}

/**
 * Create a reusable prompt template.
 */
export function createPromptTemplate(
  template: string,
  options?: { system?: string },
): PromptTemplate {
  const variables: string[] = [];
  for (const match of template.matchAll(VARIABLE_PATTERN)) {
    if (!variables.includes(match[1])) {
      variables.push(match[1]);
    }
  }

  return {
    system: options?.system,
    template,
    variables,
  };
}

/**
 * Execute a prompt template with given variables.
 */
export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): { prompt: string; system?: string } {
  const missingVars = template.variables.filter((v) => !(v in variables));
  if (missingVars.length > 0) {
    throw new Error(`Missing template variables: ${missingVars.join(', ')}`);
  }

  return {
    prompt: buildPrompt(template.template, variables),
    system: template.system,
  };
}
