export interface ClipboardLike {
  writeText(text: string): Promise<void>;
}

export class ClipboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClipboardError';
  }
}

export type CopyResult = { ok: true } | { ok: false; error: ClipboardError };

function browserClipboard(): ClipboardLike | null {
  return typeof navigator !== 'undefined' && navigator.clipboard ? navigator.clipboard : null;
}

/**
 * Copies text to the system clipboard. A failure is reported, never thrown:
 * copying is a convenience and must not interrupt the page.
 */
export async function copyToClipboard(
  text: string,
  clipboard: ClipboardLike | null = browserClipboard()
): Promise<CopyResult> {
  if (!clipboard) {
    return { ok: false, error: new ClipboardError('Clipboard is not available in this browser') };
  }
  try {
    await clipboard.writeText(text);
    return { ok: true };
  } catch (error) {
    console.error('Failed to copy to clipboard:', error);
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new ClipboardError(`Could not copy to clipboard: ${reason}`, { cause: error }) };
  }
}
