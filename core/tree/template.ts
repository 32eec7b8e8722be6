/**
 * Minimal `{{ name }}` template rendering for generated files.
 *
 * @module tree/template
 */

/**
 * Values available to a template. Nested objects are addressed with dots.
 */
export interface TemplateVars {
  [key: string]: TemplateValue
}

export type TemplateValue = string | number | boolean | null | undefined | TemplateVars

const PLACEHOLDER = /\{\{\s*([\w.-]+)\s*\}\}/g

function lookup(vars: TemplateVars, key: string): string | undefined {
  let current: TemplateValue = vars
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined
    }
    current = current[part]
  }
  if (current === undefined || current === null || typeof current === 'object') {
    return undefined
  }
  return String(current)
}

/**
 * Replace `{{ key }}` placeholders. Unknown keys are left as they are.
 *
 * @example
 * ```typescript
 * renderTemplate('Hello {{ name }}!', { name: 'world' })       // 'Hello world!'
 * renderTemplate('v{{app.version}}', { app: { version: 2 } })  // 'v2'
 * renderTemplate('{{ missing }}', {})                          // '{{ missing }}'
 * ```
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (placeholder: string, key: string) => lookup(vars, key) ?? placeholder)
}
