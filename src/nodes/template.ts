/**
 * Prompt Templates
 *
 * `{name}` placeholders (word characters only) are filled from a context
 * object; `{{` and `}}` stand for literal braces. Anything else in braces
 * is left as written.
 */

const TOKEN_PATTERN = /\{\{|\}\}|\{(\w+)\}/g;

/**
 * Placeholder names used by a template, in order of first appearance
 */
export function extractTemplateKeys(template: string): string[] {
  const keys = new Set<string>();
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    if (match[1] !== undefined) keys.add(match[1]);
  }
  return Array.from(keys);
}

/**
 * Fill placeholders from `context`; missing keys render as ""
 */
export function renderTemplate(template: string, context: Record<string, unknown>): string {
  return template.replace(TOKEN_PATTERN, (token: string, key: string | undefined) => {
    if (key === undefined) return token === "{{" ? "{" : "}";
    const value = context[key];
    return value === undefined || value === null ? "" : String(value);
  });
}
