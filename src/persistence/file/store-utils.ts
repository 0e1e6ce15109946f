import fs from "node:fs/promises";
import path from "node:path";

const lockByPath = new Map<string, Promise<void>>();
const LOCK_RETRY_MS = 15;
const LOCK_TIMEOUT_MS = 10_000;
const STALE_LOCK_MS = 60_000;

export const encodeJson = (value: unknown): string => `${JSON.stringify(value, null, 2)}\n`;

const wait = async (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && "code" in error && error.code === code;

const ensureParentDir = async (filePath: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
};

// Same directory as the target so the final rename never crosses a filesystem.
const getTempPath = (filePath: string): string =>
  `${filePath}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`;

const acquireCrossProcessLock = async (
  filePath: string,
): Promise<() => Promise<void>> => {
  const lockPath = `${filePath}.lock`;
  await ensureParentDir(filePath);
  const start = Date.now();

  while (true) {
    try {
      const handle = await fs.open(lockPath, "wx");
      return async () => {
        await handle.close();
        await fs.unlink(lockPath).catch((error: unknown) => {
          if (!isErrnoCode(error, "ENOENT")) {
            throw error;
          }
        });
      };
    } catch (error) {
      if (!isErrnoCode(error, "EEXIST")) {
        throw error;
      }

      const now = Date.now();
      if (now - start >= LOCK_TIMEOUT_MS) {
        throw new Error(`Timed out acquiring file lock for ${filePath}`);
      }

      try {
        const stat = await fs.stat(lockPath);
        if (now - stat.mtimeMs > STALE_LOCK_MS) {
          await fs.unlink(lockPath).catch((unlinkError: unknown) => {
            if (!isErrnoCode(unlinkError, "ENOENT")) {
              throw unlinkError;
            }
          });
          continue;
        }
      } catch (statError) {
        if (!isErrnoCode(statError, "ENOENT")) {
          throw statError;
        }
      }

      await wait(LOCK_RETRY_MS);
    }
  }
};

/**
 * Serializes operations on one path, within the process through a promise
 * chain and across processes through a `.lock` file. Operations on different
 * paths never wait on each other.
 */
export const withPathLock = async <T>(filePath: string, operation: () => Promise<T>): Promise<T> => {
  const previous = lockByPath.get(filePath) ?? Promise.resolve();

  let release: () => void = () => undefined;
  const marker = new Promise<void>((resolve) => {
    release = resolve;
  });
  const tail = previous.then(() => marker);

  lockByPath.set(filePath, tail);

  await previous;
  let releaseCrossProcessLock: (() => Promise<void>) | null = null;
  try {
    releaseCrossProcessLock = await acquireCrossProcessLock(filePath);
    return await operation();
  } finally {
    try {
      if (releaseCrossProcessLock) {
        await releaseCrossProcessLock();
      }
    } finally {
      release();
      if (lockByPath.get(filePath) === tail) {
        lockByPath.delete(filePath);
      }
    }
  }
};

/**
 * Reads and parses a JSON file. Returns `null` when the file does not exist.
 */
export const readJsonFile = async (filePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
  return JSON.parse(raw) as unknown;
};

/**
 * Replaces the file atomically: the content is written to a temp file, flushed
 * and renamed over the target, so readers see either the old or the new file.
 */
export const writeJsonFileAtomic = async (filePath: string, value: unknown): Promise<void> => {
  await withPathLock(filePath, async () => {
    await ensureParentDir(filePath);
    const tempPath = getTempPath(filePath);
    const handle = await fs.open(tempPath, "w");
    try {
      await handle.writeFile(encodeJson(value), "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  });
};

export const appendJsonlFile = async <T>(filePath: string, row: T): Promise<void> => {
  await withPathLock(filePath, async () => {
    await ensureParentDir(filePath);
    await fs.appendFile(filePath, `${JSON.stringify(row)}\n`, "utf-8");
  });
};

/** Non-empty lines of a JSONL file, unparsed. A missing file has none. */
export const readJsonlLines = async (filePath: string): Promise<string[]> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }

  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};

export const normalizeNullableString = (value: string | null | undefined): string | null => {
  if (value == null) {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
};

export const parseDate = (value: string | Date | null | undefined): Date | null => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "string") {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return null;
};
