import keywords from "../data/medical-keywords.json";

export const MEDICAL_KEYWORDS: readonly string[] = Object.freeze(keywords.map((k) => k.toLowerCase()));

/**
 * Crude keyword gate: true when any keyword occurs anywhere in the text.
 * Plain substring match after lower-casing, so "painting" matches "pain".
 */
export function isMedical(text: string): boolean {
  const lower = text.toLowerCase();
  return MEDICAL_KEYWORDS.some((k) => lower.includes(k));
}
