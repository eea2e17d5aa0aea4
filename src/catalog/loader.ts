import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { ZodError } from "zod";
import { CatalogError, SchemaError } from "../utils/errors";
import type { Command, DialogueCommand, FormatDescriptor, Step } from "../types";
import {
  CatalogSourceSchema,
  type RawCommand,
  type RawDialogueCommand,
  type RawStep,
} from "./schema";
import { normalizeAnswer } from "./normalize";

export type CatalogSource = {
  name: string;
  commands: unknown;
};

export class Catalog {
  private readonly commands: ReadonlyMap<string, Command>;

  /** Commands are frozen by the loader; the map itself is never exposed. */
  constructor(commands: Map<string, Command>) {
    this.commands = commands;
  }

  get(key: string): Command | undefined {
    return this.commands.get(key);
  }

  getDialogue(key: string): DialogueCommand | undefined {
    const command = this.commands.get(key);
    return command && command.kind !== "simple" ? command : undefined;
  }

  keys(): string[] {
    return [...this.commands.keys()];
  }

  /** In load order: source order, then declaration order within a source. */
  values(): Command[] {
    return [...this.commands.values()];
  }

  get size(): number {
    return this.commands.size;
  }
}

function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function normalizedMap(raw: Record<string, string>): Map<string, string> {
  const map = new Map<string, string>();
  for (const [answer, value] of Object.entries(raw)) {
    map.set(normalizeAnswer(answer), value);
  }
  return map;
}

function buildStep(raw: RawStep, commandKey: string): Step {
  const base = {
    id: raw.id,
    storeResponse: raw.store_response,
    choices: raw.expect ? Object.freeze([...raw.expect]) : null,
    expectedAnswers: raw.expect
      ? new Map(raw.expect.map((literal) => [normalizeAnswer(literal), literal]))
      : null,
    responses: normalizedMap(raw.responses),
    goto: normalizedMap(raw.goto),
    isFinal: raw.is_final,
  };

  if (!raw.api) {
    return Object.freeze({ ...base, kind: "prompt", prompt: raw.bot ?? "" });
  }
  if (!raw.response_format) {
    throw new SchemaError(`api step "${raw.id}" has no response_format`, commandKey);
  }
  const format: FormatDescriptor = {
    slots: Object.fromEntries(
      Object.entries(raw.response_format.format_rules).map(([name, rule]) => [
        name,
        Object.freeze({ template: rule.template, joinWith: rule.join_with }),
      ])
    ),
    successTemplate: raw.response_format.success_message,
    errorText: raw.response_format.error_message,
    fallbackText: raw.response_format.fallback,
  };
  Object.freeze(format.slots);
  return Object.freeze({
    ...base,
    kind: "api",
    prompt: raw.bot ?? null,
    api: Object.freeze({
      ...raw.api,
      headers: Object.freeze({ ...raw.api.headers }),
      payload: Object.freeze({ ...raw.api.payload }),
    }),
    format: Object.freeze(format),
  });
}

function buildDialogue(key: string, raw: RawDialogueCommand): DialogueCommand {
  const steps = Object.freeze(raw.steps.map((step) => buildStep(step, key)));
  const stepIndex = new Map<string, number>();
  steps.forEach((step, i) => {
    if (stepIndex.has(step.id)) {
      throw new SchemaError(`duplicate step id "${step.id}"`, key);
    }
    stepIndex.set(step.id, i);
  });

  for (const step of steps) {
    for (const [answer, target] of step.goto) {
      if (!stepIndex.has(target)) {
        throw new SchemaError(
          `step "${step.id}" goes to unknown step "${target}" on "${answer}"`,
          key
        );
      }
    }
  }

  if (stepIndex.has(raw.field_selector) && !stepIndex.has(raw.confirmation_step)) {
    throw new SchemaError(
      `field selector "${raw.field_selector}" has no confirmation step "${raw.confirmation_step}"`,
      key
    );
  }

  return Object.freeze({
    kind: raw.type === "api_request" ? "api" : "scripted",
    key,
    samples: Object.freeze([...raw.samples]),
    steps,
    stepIndex,
    fieldSelectorStep: raw.field_selector,
    confirmationStep: raw.confirmation_step,
  });
}

function buildCommand(key: string, raw: RawCommand): Command {
  if (raw.type === "simple") {
    return Object.freeze({
      kind: "simple",
      key,
      reply: raw.response,
      samples: Object.freeze([...raw.samples]),
    });
  }
  return buildDialogue(key, raw);
}

export function loadCatalog(sources: CatalogSource[]): Catalog {
  const commands = new Map<string, Command>();
  const origin = new Map<string, string>();

  for (const source of sources) {
    const parsed = CatalogSourceSchema.safeParse(source.commands);
    if (!parsed.success) {
      throw new CatalogError(describeZodError(parsed.error), source.name);
    }
    for (const [key, raw] of Object.entries(parsed.data)) {
      const previous = origin.get(key);
      if (previous !== undefined) {
        throw new CatalogError(`command "${key}" is already defined in ${previous}`, source.name);
      }
      origin.set(key, source.name);
      commands.set(key, buildCommand(key, raw));
    }
  }

  return new Catalog(commands);
}

export async function loadCatalogFromDir(dir: string): Promise<Catalog> {
  const files = (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  const sources: CatalogSource[] = [];
  for (const file of files) {
    const text = await readFile(path.join(dir, file), "utf8");
    let commands: unknown;
    try {
      commands = JSON.parse(text);
    } catch (err) {
      throw new CatalogError(`invalid JSON (${String(err)})`, file);
    }
    sources.push({ name: file, commands });
  }
  return loadCatalog(sources);
}
