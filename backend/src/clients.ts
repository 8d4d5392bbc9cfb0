import { GoogleGenAI } from '@google/genai';
import Groq from 'groq-sdk';
import type { AppConfig } from './config/env';
import { ConfigurationError } from './types/errors';
import { Logger } from './utils/logger';
import { TranscriptionService, type Transcriber } from './services/TranscriptionService';
import {
  GeminiTranslationService,
  GroqChatTranslationService,
  type Translator,
} from './services/TranslationService';

export interface ServiceClients {
  transcriber: Transcriber;
  translator: Translator;
}

/**
 * Builds the speech-to-text and translation services from configuration
 */
export function createServiceClients(config: AppConfig, logger: Logger): ServiceClients {
  const groq = new Groq({ apiKey: config.groqApiKey });
  const transcriber = new TranscriptionService(groq, logger.child('transcription'));

  if (config.translationProvider === 'groq') {
    return {
      transcriber,
      translator: new GroqChatTranslationService(groq, config.groqChatModel, logger.child('translation')),
    };
  }

  if (!config.googleApiKey) {
    throw new ConfigurationError('GOOGLE_API_KEY is required for the gemini translation provider');
  }
  const genai = new GoogleGenAI({ apiKey: config.googleApiKey });
  return {
    transcriber,
    translator: new GeminiTranslationService(genai, config.geminiModel, logger.child('translation')),
  };
}
