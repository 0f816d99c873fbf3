import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

const fileLocks = new Map<string, Promise<void>>();
const TRANSIENT_PARSE_RETRIES = 3;
const TRANSIENT_PARSE_RETRY_DELAY_MS = 15;
let tmpCounter = 0;

async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = fileLocks.get(key) ?? Promise.resolve();
  const run = previous.then(fn, fn);
  const settled = run.then(
    () => undefined,
    () => undefined
  );
  fileLocks.set(key, settled);
  await settled;
  if (fileLocks.get(key) === settled) {
    fileLocks.delete(key);
  }
  return run;
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function waitForWriter(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, TRANSIENT_PARSE_RETRY_DELAY_MS));
}

export async function readJsonFile<T>(filePath: string, defaultValue: T): Promise<T> {
  for (let attempt = 0; attempt <= TRANSIENT_PARSE_RETRIES; attempt += 1) {
    try {
      const content = await readFile(filePath, 'utf8');

      if (content.trim().length === 0 && attempt < TRANSIENT_PARSE_RETRIES) {
        await waitForWriter();
        continue;
      }

      return JSON.parse(content) as T;
    } catch (error) {
      if (isMissingFile(error)) {
        return defaultValue;
      }

      if (
        error instanceof SyntaxError &&
        error.message.includes('Unexpected end of JSON input') &&
        attempt < TRANSIENT_PARSE_RETRIES
      ) {
        await waitForWriter();
        continue;
      }

      throw error;
    }
  }

  return defaultValue;
}

/**
 * Writes through a sibling temp file and renames it into place, so readers
 * see either the old content or the new content and never a partial file.
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.${tmpCounter}.tmp`;
  try {
    await writeFile(tmpPath, content, 'utf8');
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export async function writeJsonFile<T>(filePath: string, value: T): Promise<void> {
  await writeTextFileAtomic(filePath, JSON.stringify(value, null, 2));
}

export async function updateJsonFile<T>(
  filePath: string,
  defaultValue: T,
  mutator: (current: T) => T
): Promise<T> {
  return withLock(filePath, async () => {
    const current = await readJsonFile(filePath, defaultValue);
    const next = mutator(current);
    await writeJsonFile(filePath, next);
    return next;
  });
}
