import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger, silentLogger } from '../utils/logger';

const STAGING_PREFIX = 'audio-transcriber-';

/**
 * Writes `content` to a fresh temporary file, hands its path to `consumer`,
 * and removes the file once the consumer settles, whatever the outcome.
 */
export async function withStagedFile<T>(
  content: Uint8Array,
  suffix: string,
  consumer: (filePath: string) => Promise<T>,
  logger: Logger = silentLogger
): Promise<T> {
  const directory = await mkdtemp(join(tmpdir(), STAGING_PREFIX));
  const filePath = join(directory, `audio${suffix}`);

  try {
    await writeFile(filePath, content);
    logger.debug(`Temporary file created: ${filePath} (${content.byteLength} bytes)`);
    return await consumer(filePath);
  } finally {
    await rm(directory, { recursive: true, force: true });
    logger.debug(`Temporary file deleted: ${filePath}`);
  }
}
