/**
 * `{{key}}` placeholder rendering for e-mail templates
 */

export type TemplateContext = Readonly<Record<string, string | number | boolean | null | undefined>>;

const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_.]+)\s*\}\}/g;

/**
 * Replace each `{{key}}` with the context value. Unknown keys stay as written.
 */
export function renderTemplate(content: string, context: TemplateContext): string {
  return content.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    const value = context[key];
    return value === undefined || value === null ? placeholder : String(value);
  });
}
