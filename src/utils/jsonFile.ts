import { readFile, writeFile } from 'fs/promises';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Reads and parses a JSON file. A missing file reads as null; bad JSON throws. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  const value: unknown = JSON.parse(raw);
  return value;
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2), 'utf8');
}
