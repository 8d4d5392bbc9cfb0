import type {
  ApiErrorBody,
  CreatedSession,
  LanguageOption,
  LanguageSelection,
  SessionSnapshot,
} from '../types/ApiResponse';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class ApiError extends Error {
  readonly status: number;
  readonly kind: string;
  readonly session: SessionSnapshot | null;

  constructor(status: number, kind: string, message: string, session: SessionSnapshot | null = null) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.kind = kind;
    this.session = session;
  }
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return (
    typeof error === 'object' &&
    error !== null &&
    'kind' in error &&
    typeof error.kind === 'string' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

async function toApiError(response: Response): Promise<ApiError> {
  const isJson = response.headers.get('content-type')?.includes('application/json') ?? false;
  const body: unknown = isJson ? await response.json() : null;
  if (isApiErrorBody(body)) {
    return new ApiError(response.status, body.error.kind, body.error.message, body.session ?? null);
  }
  return new ApiError(response.status, 'http_error', `Request failed: ${response.status} ${response.statusText}`);
}

/**
 * Client for the transcription backend
 */
export class TranscriberApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(baseUrl: string = '/api', fetchImpl: FetchLike = (input, init) => fetch(input, init)) {
    this.baseUrl = baseUrl;
    this.fetchImpl = fetchImpl;
  }

  listLanguages(): Promise<LanguageOption[]> {
    return this.request<LanguageOption[]>('/languages', { method: 'GET' });
  }

  createSession(): Promise<CreatedSession> {
    return this.request<CreatedSession>('/sessions', { method: 'POST' });
  }

  getSession(sessionId: string): Promise<SessionSnapshot> {
    return this.request<SessionSnapshot>(`/sessions/${encodeURIComponent(sessionId)}`, { method: 'GET' });
  }

  selectLanguages(sessionId: string, selection: LanguageSelection): Promise<SessionSnapshot> {
    return this.request<SessionSnapshot>(`/sessions/${encodeURIComponent(sessionId)}/languages`, {
      method: 'PUT',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(selection),
    });
  }

  /**
   * Upload the audio clip as multipart form data
   */
  uploadAudio(sessionId: string, audio: Blob, fileName: string): Promise<SessionSnapshot> {
    const formData = new FormData();
    formData.append('file', audio, fileName);
    return this.request<SessionSnapshot>(`/sessions/${encodeURIComponent(sessionId)}/audio`, {
      method: 'POST',
      body: formData,
    });
  }

  transcribe(sessionId: string): Promise<SessionSnapshot> {
    return this.request<SessionSnapshot>(`/sessions/${encodeURIComponent(sessionId)}/transcribe`, { method: 'POST' });
  }

  translate(sessionId: string): Promise<SessionSnapshot> {
    return this.request<SessionSnapshot>(`/sessions/${encodeURIComponent(sessionId)}/translate`, { method: 'POST' });
  }

  async endSession(sessionId: string): Promise<void> {
    await this.send(`/sessions/${encodeURIComponent(sessionId)}`, { method: 'DELETE' });
  }

  private async request<T>(path: string, init: RequestInit): Promise<T> {
    const response = await this.send(path, init);
    return response.json();
  }

  private async send(path: string, init: RequestInit): Promise<Response> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, init);
      if (!response.ok) {
        throw await toApiError(response);
      }
      return response;
    } catch (error) {
      console.error(`Request to ${path} failed:`, error);
      throw error;
    }
  }
}
