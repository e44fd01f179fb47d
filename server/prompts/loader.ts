import { PROMPT_TEMPLATES } from '../../shared/prompts';

export type PromptName = 'business_intelligence.md' | 'sales_training.md';

export const loadPrompt = (filename: PromptName): string => {
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  return content;
};

/**
 * Fills `{KEY}` placeholders in one pass, so a value that itself contains
 * `{OTHER}` is left alone. Unknown placeholders stay as written.
 */
export const renderPrompt = (template: string, values: Record<string, string>): string =>
  template.replace(/\{([A-Z_]+)\}/g, (match, key: string) => values[key] ?? match);
