export type StorageLike = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

export interface StoredSession {
  id: string;
  expiry: number;
}

function isStoredSession(value: unknown): value is StoredSession {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'expiry' in value &&
    typeof value.expiry === 'number'
  );
}

/**
 * Remembers the backend session id for the lifetime of the browser tab
 */
export class SessionService {
  private readonly storageKey = 'audio_transcriber_session';
  private readonly sessionDuration = 2 * 60 * 60 * 1000; // matches the backend's default idle TTL
  private readonly storage: StorageLike;
  private readonly now: () => number;

  constructor(storage: StorageLike = window.sessionStorage, now: () => number = Date.now) {
    this.storage = storage;
    this.now = now;
  }

  saveSession(id: string): StoredSession {
    const session = { id, expiry: this.now() + this.sessionDuration };
    this.storage.setItem(this.storageKey, JSON.stringify(session));
    return session;
  }

  loadSession(): StoredSession | null {
    const sessionData = this.storage.getItem(this.storageKey);
    if (!sessionData) return null;

    let session: unknown;
    try {
      session = JSON.parse(sessionData);
    } catch (error) {
      console.warn('Discarding unreadable stored session:', error);
      this.clearSession();
      return null;
    }

    if (isStoredSession(session) && this.isValidSession(session)) {
      return session;
    }

    this.clearSession();
    return null;
  }

  clearSession(): void {
    this.storage.removeItem(this.storageKey);
  }

  isValidSession(session: StoredSession): boolean {
    return this.now() < session.expiry;
  }
}
