import { z } from "zod";

// Raw command sources as they appear in commands/*.json.

const StringMap = z.record(z.string(), z.string());

export const ApiSchema = z.object({
  method: z
    .string()
    .transform((m) => m.toUpperCase())
    .pipe(z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"])),
  url: z.string().min(1, "api url is required"),
  headers: StringMap.default({}),
  payload: z.record(z.string(), z.unknown()).default({}),
});

export const FormatRuleSchema = z.object({
  template: z.string(),
  join_with: z.string().default("\n"),
});

export const ResponseFormatSchema = z.object({
  format_rules: z.record(z.string(), FormatRuleSchema).default({}),
  success_message: z.string(),
  error_message: z.string(),
  fallback: z.string().default("No data returned."),
});

export const StepSchema = z
  .object({
    id: z.string().min(1, "step id is required"),
    bot: z.string().optional(),
    expect: z.array(z.string().min(1)).min(1).optional(),
    store_response: z.boolean().default(false),
    responses: StringMap.default({}),
    goto: StringMap.default({}),
    is_final: z.boolean().default(false),
    api: ApiSchema.optional(),
    response_format: ResponseFormatSchema.optional(),
  })
  .superRefine((step, ctx) => {
    if (!step.api && step.bot === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `step "${step.id}" needs a "bot" prompt or an "api" descriptor`,
      });
    }
  });

const Samples = z.array(z.string().min(1)).default([]);

const SimpleCommandSchema = z.object({
  type: z.literal("simple"),
  response: z.string(),
  samples: Samples,
});

const DialogueCommandSchema = z.object({
  type: z.enum(["conversation", "api_request"]),
  samples: Samples,
  steps: z.array(StepSchema).min(1, "steps must be a non-empty array"),
  field_selector: z.string().default("field_to_update"),
  confirmation_step: z.string().default("confirmation"),
});

export const CommandSchema = z.discriminatedUnion("type", [
  SimpleCommandSchema,
  DialogueCommandSchema,
]);

export const CatalogSourceSchema = z.record(z.string().min(1), CommandSchema);

export type RawStep = z.infer<typeof StepSchema>;
export type RawCommand = z.infer<typeof CommandSchema>;
export type RawDialogueCommand = z.infer<typeof DialogueCommandSchema>;
