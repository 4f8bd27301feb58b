/**
 * Evidence Sanitizer
 *
 * Corpus text is untrusted input. Any chunk containing an instruction-like
 * signature (role markers, "ignore previous ...") is dropped whole: partial
 * redaction could leave a crafted remainder intact.
 *
 * Best-effort heuristic, not a guarantee. The prompt also tells the model
 * to ignore instructions found in the context.
 */
export class EvidenceSanitizer {
  private readonly signatures: readonly string[];

  constructor(signatures: readonly string[]) {
    this.signatures = signatures
      .map((signature) => signature.trim().toLowerCase())
      .filter((signature) => signature.length > 0);
  }

  /**
   * Returns the text unchanged, or "" when any signature occurs in it.
   */
  sanitize(text: string): string {
    return this.findSignature(text) === undefined ? text : '';
  }

  /**
   * First configured signature found in the text (case-insensitive).
   */
  findSignature(text: string): string | undefined {
    const lowered = text.toLowerCase();
    return this.signatures.find((signature) => lowered.includes(signature));
  }
}
