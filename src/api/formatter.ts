import type { FormatDescriptor, FormatSlot } from "../types";
import { isRecord } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { renderTemplate, stringifyValue } from "./template";

function messageOf(payload: unknown): string | null {
  if (isRecord(payload) && typeof payload.message === "string" && payload.message !== "") {
    return payload.message;
  }
  return null;
}

export class ResponseFormatter {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /** Never throws: any failure renders the descriptor's error text. */
  format(rawBody: unknown, descriptor: FormatDescriptor): string {
    try {
      const data = isRecord(rawBody) && "data" in rawBody ? rawBody.data : rawBody;
      const parts: Record<string, string> = {};
      for (const [name, slot] of Object.entries(descriptor.slots)) {
        parts[name] = this.renderSlot(rawBody, data, slot, descriptor);
      }
      return renderTemplate(descriptor.successTemplate, parts);
    } catch (err) {
      this.logger.error("Response formatting failed", { message: String(err) });
      return descriptor.errorText;
    }
  }

  private renderSlot(
    payload: unknown,
    data: unknown,
    slot: FormatSlot,
    descriptor: FormatDescriptor
  ): string {
    if (Array.isArray(data)) {
      if (data.length === 0) {
        return messageOf(payload) ?? descriptor.fallbackText;
      }
      return data
        .map((item) => (isRecord(item) ? renderTemplate(slot.template, item) : stringifyValue(item)))
        .join(slot.joinWith);
    }
    if (isRecord(data)) {
      return renderTemplate(slot.template, data);
    }
    return messageOf(payload) ?? stringifyValue(data);
  }
}
