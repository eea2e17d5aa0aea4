/** Answers and literal keys are compared in this form. */
export function normalizeAnswer(text: string): string {
  return text.trim().toLowerCase();
}
