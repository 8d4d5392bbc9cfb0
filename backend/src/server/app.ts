import { Hono, type Context } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { languages } from '../constants/languages';
import { AppError, InvalidRequestError, describeError } from '../types/errors';
import { err, ok, type Result } from '../types/Result';
import type { SessionRegistry } from '../services/SessionRegistry';
import type { LanguageSelection, SessionResult, TranscriptionSession } from '../services/TranscriptionSession';
import { Logger, silentLogger } from '../utils/logger';

export interface AppDependencies {
  registry: SessionRegistry;
  logger?: Logger;
  logRequests?: boolean;
}

type ErrorStatus = 400 | 404 | 409 | 500 | 502;

export function statusForError(error: AppError): ErrorStatus {
  switch (error.kind) {
    case 'invalid_request':
      return 400;
    case 'session_not_found':
      return 404;
    case 'session_busy':
      return 409;
    case 'transcription_failed':
    case 'translation_failed':
      return 502;
    default:
      return 500;
  }
}

function parseLanguageSelection(body: unknown): Result<LanguageSelection, InvalidRequestError> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return err(new InvalidRequestError('Expected a JSON object with sourceLanguage and/or targetLanguage'));
  }
  const selection: LanguageSelection = {};
  if ('sourceLanguage' in body && body.sourceLanguage !== undefined) {
    if (typeof body.sourceLanguage !== 'string') {
      return err(new InvalidRequestError('sourceLanguage must be a string'));
    }
    selection.sourceLanguage = body.sourceLanguage;
  }
  if ('targetLanguage' in body && body.targetLanguage !== undefined) {
    if (typeof body.targetLanguage !== 'string') {
      return err(new InvalidRequestError('targetLanguage must be a string'));
    }
    selection.targetLanguage = body.targetLanguage;
  }
  return ok(selection);
}

async function readJson(c: Context): Promise<Result<unknown, InvalidRequestError>> {
  try {
    return ok(await c.req.json());
  } catch (error) {
    return err(new InvalidRequestError(`Invalid JSON body: ${describeError(error)}`));
  }
}

/**
 * HTTP API over the session registry. Every session route answers with the
 * session snapshot, on failure alongside the error.
 */
export function createApp({ registry, logger = silentLogger, logRequests = false }: AppDependencies): Hono {
  const app = new Hono();

  if (logRequests) {
    app.use('*', requestLogger((message, ...rest) => logger.info(message, ...rest)));
  }

  const errorResponse = (c: Context, error: AppError, session?: TranscriptionSession) =>
    c.json(
      session ? { error: error.toJSON(), session: session.snapshot() } : { error: error.toJSON() },
      statusForError(error)
    );

  const sessionResponse = (c: Context, session: TranscriptionSession, result: SessionResult) =>
    result.ok ? c.json(result.value) : errorResponse(c, result.error, session);

  const withSession = async (
    c: Context,
    handler: (session: TranscriptionSession) => Response | Promise<Response>
  ): Promise<Response> => {
    const found = registry.get(c.req.param('id') ?? '');
    if (!found.ok) {
      return errorResponse(c, found.error);
    }
    return handler(found.value);
  };

  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  app.get('/api/languages', (c) => c.json(languages));

  app.post('/api/sessions', (c) => {
    const session = registry.create();
    return c.json({ sessionId: session.id, session: session.snapshot() }, 201);
  });

  app.get('/api/sessions/:id', (c) => withSession(c, (session) => c.json(session.snapshot())));

  app.delete('/api/sessions/:id', (c) =>
    withSession(c, (session) => {
      registry.remove(session.id);
      return c.body(null, 204);
    })
  );

  app.put('/api/sessions/:id/languages', (c) =>
    withSession(c, async (session) => {
      const body = await readJson(c);
      if (!body.ok) {
        return errorResponse(c, body.error, session);
      }
      const selection = parseLanguageSelection(body.value);
      if (!selection.ok) {
        return errorResponse(c, selection.error, session);
      }

      return sessionResponse(c, session, session.selectLanguages(selection.value));
    })
  );

  app.post('/api/sessions/:id/audio', (c) =>
    withSession(c, async (session) => {
      const body = await c.req.parseBody();
      const file = body['file'];
      if (file === undefined || typeof file === 'string') {
        return errorResponse(c, new InvalidRequestError('Attach the audio file in the "file" form field'), session);
      }

      const content = new Uint8Array(await file.arrayBuffer());
      return sessionResponse(c, session, session.uploadAudio({ fileName: file.name, content, size: file.size }));
    })
  );

  app.post('/api/sessions/:id/transcribe', (c) =>
    withSession(c, async (session) => sessionResponse(c, session, await session.transcribe()))
  );

  app.post('/api/sessions/:id/translate', (c) =>
    withSession(c, async (session) => sessionResponse(c, session, await session.translate()))
  );

  app.onError((error, c) => {
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json({ error: { kind: 'internal', message: describeError(error) } }, 500);
  });

  return app;
}
