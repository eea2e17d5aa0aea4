// Conversational filler stripped before any matching. Applied in order, so
// anchored patterns see the text left by the ones before them.
const FILLER_PATTERNS: RegExp[] = [
  // English
  /what would you like to do\??/giu,
  /how can i help you.*/giu,
  /\bplease\b/giu,
  /^i(?:'d| would)? like to\b/iu,
  /^i want to\b/iu,
  /^(?:can|could) you\b/iu,
  // French
  /\bje veux\b/giu,
  /\bje voudrais\b/giu,
  /\bpouvez-vous\b/giu,
  /s'?il vous pla[iî]t/giu,
  // Arabic
  /من فضلك/gu,
  /أريد/gu,
  /هل يمكنك/gu,
];

export function stripFiller(text: string): string {
  let cleaned = text.trim();
  for (const pattern of FILLER_PATTERNS) {
    cleaned = cleaned.replace(pattern, "").trim();
  }
  return cleaned
    .replace(/[\s,;:]*[?!.]+$/u, "")
    .replace(/\s+/gu, " ")
    .trim()
    .toLowerCase();
}
