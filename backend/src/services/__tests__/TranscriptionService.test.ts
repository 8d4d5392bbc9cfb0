import { existsSync, statSync } from 'fs';
import { TranscriptionError } from '../../types/errors';
import { audioUpload, languageNamed, unwrapErr } from '../../testing/fixtures';
import { TranscriptionService, type TranscriptionRequest } from '../TranscriptionService';

describe('TranscriptionService', () => {
  const english = languageNamed('English');

  it('should send the staged clip with the fixed Whisper parameters', async () => {
    const create = jest.fn(async (_body: TranscriptionRequest) => ({ text: 'hello world' }));
    const service = new TranscriptionService({ audio: { transcriptions: { create } } });

    const result = await service.transcribe(audioUpload('meeting.m4a', 5000), english);

    expect(result).toEqual({ ok: true, value: 'hello world' });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0][0]).toMatchObject({
      model: 'whisper-large-v3',
      prompt: 'Transcribe the following audio',
      response_format: 'json',
      language: 'en',
      temperature: 0,
    });
  });

  it('should stage the clip for the duration of the call only', async () => {
    const seen: Array<{ path: string; size: number }> = [];
    const create = jest.fn(async (body: TranscriptionRequest) => {
      const path = String(body.file.path);
      seen.push({ path, size: statSync(path).size });
      return { text: 'ok' };
    });
    const service = new TranscriptionService({ audio: { transcriptions: { create } } });

    await service.transcribe(audioUpload('lecture.mp3', 2048), english);

    expect(seen).toHaveLength(1);
    expect(seen[0].size).toBe(2048);
    expect(seen[0].path.endsWith('.mp3')).toBe(true);
    expect(existsSync(seen[0].path)).toBe(false);
  });

  it('should return the same transcript for repeated calls on the same input', async () => {
    const create = jest.fn(async (_body: TranscriptionRequest) => ({ text: 'hello world' }));
    const service = new TranscriptionService({ audio: { transcriptions: { create } } });
    const upload = audioUpload();

    const first = await service.transcribe(upload, english);
    const second = await service.transcribe(upload, english);

    expect(second).toEqual(first);
    expect(create.mock.calls.map(([body]) => body.temperature)).toEqual([0, 0]);
  });

  it('should report service failures as a TranscriptionError without retrying', async () => {
    const paths: string[] = [];
    const create = jest.fn(async (body: TranscriptionRequest): Promise<{ text: string }> => {
      paths.push(String(body.file.path));
      throw new Error('connect ECONNREFUSED');
    });
    const service = new TranscriptionService({ audio: { transcriptions: { create } } });

    const error = unwrapErr(await service.transcribe(audioUpload(), english));

    expect(error).toBeInstanceOf(TranscriptionError);
    expect(error.kind).toBe('transcription_failed');
    expect(error.message).toBe('An error occurred during transcription: connect ECONNREFUSED');
    expect(create).toHaveBeenCalledTimes(1);
    expect(existsSync(paths[0])).toBe(false);
  });
});
