export const languages = [
  { name: 'English', code: 'en' },
  { name: 'Turkish', code: 'tr' },
  { name: 'German', code: 'de' },
  { name: 'French', code: 'fr' },
  { name: 'Spanish', code: 'es' },
  { name: 'Italian', code: 'it' },
  { name: 'Dutch', code: 'nl' },
] as const;

export type Language = (typeof languages)[number];
export type LanguageName = Language['name'];

export const DEFAULT_SOURCE_LANGUAGE: Language = languages[0];

export const languageNames: LanguageName[] = languages.map((language) => language.name);

export function findLanguage(name: string): Language | undefined {
  return languages.find((language) => language.name === name);
}

export function findLanguageByCode(code: string): Language | undefined {
  return languages.find((language) => language.code === code);
}

/**
 * Languages a transcript in `source` may be translated into
 */
export function targetLanguagesFor(source: Language): Language[] {
  return languages.filter((language) => language.code !== source.code);
}

export const ACCEPTED_AUDIO_EXTENSIONS = ['m4a', 'mp3'] as const;
export type AudioExtension = (typeof ACCEPTED_AUDIO_EXTENSIONS)[number];

export function audioExtensionOf(fileName: string): AudioExtension | undefined {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0) return undefined;
  const extension = fileName.slice(dot + 1).toLowerCase();
  return ACCEPTED_AUDIO_EXTENSIONS.find((accepted) => accepted === extension);
}
