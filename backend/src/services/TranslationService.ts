import type { Language } from '../constants/languages';
import { TranslationError } from '../types/errors';
import { err, ok, type Result } from '../types/Result';
import { Logger, silentLogger } from '../utils/logger';

export interface TranslationRequest {
  text: string;
  sourceLanguage: Language;
  targetLanguage: Language;
}

export interface Translator {
  translate(request: TranslationRequest): Promise<Result<string, TranslationError>>;
}

/**
 * The part of the `@google/genai` client used for translation
 */
export interface GenerativeModelClient {
  models: {
    generateContent(params: {
      model: string;
      contents: string;
      config: { systemInstruction: string };
    }): Promise<{ text?: string }>;
  };
}

/**
 * The part of the Groq SDK client used for chat completions
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'user'; content: string }>;
        temperature: number;
        max_tokens: number;
      }): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export const CHAT_TRANSLATION_TEMPERATURE = 0.1;
export const CHAT_TRANSLATION_MAX_TOKENS = 4096;

export function buildSystemInstruction(source: Language, target: Language): string {
  return [
    'You are a helpful language translator.',
    `Your mission is to translate text from ${source.name} to ${target.name}.`,
    'Ensure that the translation maintains the original meaning, tone, and style as much as possible.',
    'If there are any cultural nuances or idiomatic expressions, try to find appropriate equivalents in the target language.',
  ].join('\n');
}

export function buildChatPrompt(text: string, target: Language): string {
  return `Translate the following text to ${target.name}:\n\n${text}`;
}

function requireText(output: string | null | undefined): string {
  const text = output?.trim();
  if (!text) {
    throw new Error('The model returned an empty translation');
  }
  return text;
}

/**
 * Translates with a Gemini model whose system instruction fixes the language pair.
 */
export class GeminiTranslationService implements Translator {
  constructor(
    private readonly client: GenerativeModelClient,
    private readonly model: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async translate({ text, sourceLanguage, targetLanguage }: TranslationRequest): Promise<Result<string, TranslationError>> {
    this.logger.debug(`Translating ${text.length} characters ${sourceLanguage.code} -> ${targetLanguage.code} with ${this.model}`);
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: text,
        config: { systemInstruction: buildSystemInstruction(sourceLanguage, targetLanguage) },
      });
      return ok(requireText(response.text));
    } catch (error) {
      this.logger.error('Error occurred during translation:', error);
      return err(new TranslationError(error));
    }
  }
}

/**
 * Translates with a general chat-completion model and an explicit instruction prompt.
 */
export class GroqChatTranslationService implements Translator {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async translate({ text, sourceLanguage, targetLanguage }: TranslationRequest): Promise<Result<string, TranslationError>> {
    this.logger.debug(`Translating ${text.length} characters ${sourceLanguage.code} -> ${targetLanguage.code} with ${this.model}`);
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: buildChatPrompt(text, targetLanguage) }],
        temperature: CHAT_TRANSLATION_TEMPERATURE,
        max_tokens: CHAT_TRANSLATION_MAX_TOKENS,
      });
      return ok(requireText(completion.choices[0]?.message.content));
    } catch (error) {
      this.logger.error('Error occurred during translation:', error);
      return err(new TranslationError(error));
    }
  }
}
