import { TemplateError, isRecord } from "../utils/errors";

const PLACEHOLDER = /\{\{|\}\}|\{([^{}]*)\}/g;

export type TemplateValues = Record<string, unknown> | ReadonlyMap<string, unknown>;

function lookup(values: TemplateValues, field: string): { found: boolean; value: unknown } {
  if (values instanceof Map) {
    return { found: values.has(field), value: values.get(field) };
  }
  if (isRecord(values) && Object.prototype.hasOwnProperty.call(values, field)) {
    return { found: true, value: values[field] };
  }
  return { found: false, value: undefined };
}

export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Substitutes `{field}` by exact key. `{{` and `}}` render literal braces.
 * Throws TemplateError for a field with no value.
 */
export function renderTemplate(
  template: string,
  values: TemplateValues,
  encode: (value: string) => string = (v) => v
): string {
  return template.replace(PLACEHOLDER, (token, field: string | undefined) => {
    if (token === "{{") return "{";
    if (token === "}}") return "}";
    const name = field ?? "";
    const { found, value } = lookup(values, name);
    if (!found || name === "") throw new TemplateError(name);
    return encode(stringifyValue(value));
  });
}
