export const LANGUAGE_CODES = ['tr', 'en', 'fr', 'de', 'es', 'it'] as const;
export type LanguageCode = typeof LANGUAGE_CODES[number];

export const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  tr: 'Turkish',
  en: 'English',
  fr: 'French',
  de: 'German',
  es: 'Spanish',
  it: 'Italian',
};

export function languageName(code: LanguageCode): string {
  return LANGUAGE_NAMES[code];
}

// Keeps the first occurrence of each code, preserving selection order
export function distinctLanguages(codes: readonly LanguageCode[]): LanguageCode[] {
  return [...new Set(codes)];
}
