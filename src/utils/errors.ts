/** Malformed or conflicting command definitions. Fatal at load. */
export class CatalogError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "CatalogError";
  }
}

/** Dangling step references inside a command. Fatal at load. */
export class SchemaError extends Error {
  constructor(message: string, readonly commandKey: string) {
    super(`command "${commandKey}": ${message}`);
    this.name = "SchemaError";
  }
}

/** A template placeholder with no value. Absorbed into a user-facing message. */
export class TemplateError extends Error {
  constructor(readonly field: string) {
    super(`missing template field "${field}"`);
    this.name = "TemplateError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
