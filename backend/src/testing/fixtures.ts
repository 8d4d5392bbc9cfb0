import { findLanguage, type Language, type LanguageName } from '../constants/languages';
import type { AudioUpload } from '../types/audio';
import type { TranscriptionError, TranslationError } from '../types/errors';
import type { Result } from '../types/Result';
import type { Transcriber } from '../services/TranscriptionService';
import type { TranslationRequest, Translator } from '../services/TranslationService';

export function languageNamed(name: LanguageName): Language {
  const language = findLanguage(name);
  if (!language) {
    throw new Error(`Unknown language ${name}`);
  }
  return language;
}

export function audioUpload(fileName = 'meeting.m4a', size = 5000): AudioUpload {
  const content = new Uint8Array(size).fill(1);
  return { fileName, content, size };
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`Expected a successful result, got ${String(result.error)}`);
  }
  return result.value;
}

export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) {
    throw new Error('Expected a failed result');
  }
  return result.error;
}

export function stubTranscriber() {
  const transcribe = jest.fn<Promise<Result<string, TranscriptionError>>, [AudioUpload, Language]>();
  const transcriber: Transcriber = { transcribe };
  return { transcriber, transcribe };
}

export function stubTranslator() {
  const translate = jest.fn<Promise<Result<string, TranslationError>>, [TranslationRequest]>();
  const translator: Translator = { translate };
  return { translator, translate };
}
