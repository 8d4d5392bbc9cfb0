import { createReadStream, type ReadStream } from 'fs';
import { audioExtensionOf, type Language } from '../constants/languages';
import type { AudioUpload } from '../types/audio';
import { TranscriptionError } from '../types/errors';
import { err, ok, type Result } from '../types/Result';
import { Logger, silentLogger } from '../utils/logger';
import { withStagedFile } from './TempFileStager';

export const WHISPER_MODEL = 'whisper-large-v3';
export const TRANSCRIPTION_PROMPT = 'Transcribe the following audio';
export const TRANSCRIPTION_TEMPERATURE = 0.0;

export interface TranscriptionRequest {
  file: ReadStream;
  model: string;
  prompt: string;
  response_format: 'json';
  language: string;
  temperature: number;
}

/**
 * The part of the Groq SDK client used for speech-to-text
 */
export interface SpeechToTextClient {
  audio: {
    transcriptions: {
      create(body: TranscriptionRequest): PromiseLike<{ text: string }>;
    };
  };
}

export interface Transcriber {
  transcribe(audio: AudioUpload, language: Language): Promise<Result<string, TranscriptionError>>;
}

/**
 * Sends one uploaded clip to Whisper and returns the transcript text.
 * Failures come back as a TranscriptionError result; nothing is retried.
 */
export class TranscriptionService implements Transcriber {
  private readonly client: SpeechToTextClient;
  private readonly logger: Logger;

  constructor(client: SpeechToTextClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  async transcribe(audio: AudioUpload, language: Language): Promise<Result<string, TranscriptionError>> {
    const suffix = `.${audioExtensionOf(audio.fileName) ?? 'm4a'}`;

    try {
      const text = await withStagedFile(
        audio.content,
        suffix,
        (filePath) => this.requestTranscription(filePath, language),
        this.logger
      );
      this.logger.debug(`Transcription received: ${text.length} characters`);
      return ok(text);
    } catch (error) {
      this.logger.error(`Error occurred during transcription of ${audio.fileName}:`, error);
      return err(new TranscriptionError(error));
    }
  }

  private async requestTranscription(filePath: string, language: Language): Promise<string> {
    const parameters = {
      model: WHISPER_MODEL,
      prompt: TRANSCRIPTION_PROMPT,
      response_format: 'json' as const,
      language: language.code,
      temperature: TRANSCRIPTION_TEMPERATURE,
    };
    this.logger.debug('API request parameters:', JSON.stringify({ file: filePath, ...parameters }));

    const file = createReadStream(filePath);
    try {
      const response = await this.client.audio.transcriptions.create({ file, ...parameters });
      return response.text;
    } finally {
      // The staged file is removed right after this returns
      file.destroy();
    }
  }
}
