import { TemplateError } from './errors.js';

// `{{` and `}}` are escaped braces, `{name}` a placeholder, anything else a stray brace
const TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

/**
 * Fills `{name}` placeholders from `values`. A template with no placeholder is
 * returned unchanged; an unknown name or an unbalanced brace is a TemplateError.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>) {
  return template.replace(TOKEN, (match: string, name: string | undefined, offset: number) => {
    if (match === '{{') return '{';
    if (match === '}}') return '}';
    if (name === undefined) throw new TemplateError(`unbalanced '${match}' at position ${offset}`);
    if (!Object.hasOwn(values, name)) throw new TemplateError(`unknown placeholder {${name}}`);
    return values[name];
  });
}
