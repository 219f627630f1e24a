import fs from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import { logger } from './logger.js';

export type JsonReadResult = { found: false } | { found: true; value: unknown };

/**
 * Read and parse a JSON file. A missing file is reported as `found: false`;
 * any other read error or a parse error is thrown.
 */
export async function readJsonFile(file: string): Promise<JsonReadResult> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { found: false };
    }
    throw err;
  }
  return { found: true, value: JSON.parse(text) };
}

/**
 * Write a JSON file atomically: the content goes to a temp file in the same
 * directory, is flushed, then renamed over the target.
 */
export async function writeJsonFileAtomic(file: string, value: unknown): Promise<void> {
  const dir = path.dirname(file);
  const tmp = path.join(dir, `.${path.basename(file)}.${uuid()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  try {
    const handle = await fs.open(tmp, 'w');
    try {
      await handle.writeFile(`${JSON.stringify(value, null, 2)}\n`, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, file);
  } catch (err) {
    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.error({ err: rmErr, tmp }, 'failed to remove temp file');
    });
    throw err;
  }
}

/**
 * Runs async tasks one at a time in submission order.
 * A failed task does not block the ones queued after it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
