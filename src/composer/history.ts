import { rename } from 'fs/promises';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { readJsonFile, writeJsonFile } from '../utils/jsonFile.js';
import type { HistoryEntry, PostHistory } from './types.js';

export const HISTORY_LIMIT = 50;
const PREVIEW_CHARS = 100;

const historyEntrySchema = z.object({
  date: z.string(),
  topic: z.string(),
  post_preview: z.string(),
  post_id: z.string(),
});

const historyFileSchema = z.object({
  posts: z.array(z.unknown()).default([]),
});

interface StoredHistory {
  history: PostHistory;
  /** False when the file exists but could not be read as a post history. */
  readable: boolean;
}

async function readHistory(filePath: string): Promise<StoredHistory> {
  let stored: unknown;
  try {
    stored = await readJsonFile(filePath);
  } catch (err) {
    console.warn(`[history] Could not read ${filePath}, starting a new history: ${errorMessage(err)}`);
    return { history: { posts: [] }, readable: false };
  }
  if (stored === null) return { history: { posts: [] }, readable: true };

  const parsed = historyFileSchema.safeParse(stored);
  if (!parsed.success) {
    console.warn(`[history] ${filePath} is not a post history, starting a new one.`);
    return { history: { posts: [] }, readable: false };
  }

  const posts: HistoryEntry[] = [];
  for (const raw of parsed.data.posts) {
    const entry = historyEntrySchema.safeParse(raw);
    if (entry.success) posts.push(entry.data);
  }

  const skipped = parsed.data.posts.length - posts.length;
  if (skipped > 0) console.warn(`[history] Skipped ${skipped} malformed entry(ies) in ${filePath}`);
  return { history: { posts }, readable: true };
}

/** Malformed entries are skipped; the rest of the file is kept. */
export async function loadHistory(filePath: string): Promise<PostHistory> {
  return (await readHistory(filePath)).history;
}

export function buildHistoryEntry(
  topic: string,
  content: string,
  postId: string | undefined,
  now = new Date(),
): HistoryEntry {
  return {
    date: now.toISOString(),
    topic,
    post_preview: `${content.slice(0, PREVIEW_CHARS)}...`,
    post_id: postId ?? 'unknown',
  };
}

/** Oldest entries fall off the front once the history is over the limit. */
export function appendEntry(history: PostHistory, entry: HistoryEntry, limit = HISTORY_LIMIT): PostHistory {
  return { ...history, posts: [...history.posts, entry].slice(-limit) };
}

/**
 * Read, append, rewrite. Not atomic and not locked: one run at a time.
 * A file that cannot be read as a history is moved to `<file>.bak` first.
 */
export async function appendHistory(
  filePath: string,
  entry: HistoryEntry,
  limit = HISTORY_LIMIT,
): Promise<PostHistory> {
  const stored = await readHistory(filePath);
  if (!stored.readable) {
    const backup = `${filePath}.bak`;
    await rename(filePath, backup);
    console.warn(`[history] Moved unreadable ${filePath} to ${backup}`);
  }

  const history = appendEntry(stored.history, entry, limit);
  await writeJsonFile(filePath, history);
  console.log(`[history] Saved to ${filePath} (${history.posts.length} entries)`);
  return history;
}

/** Most recent topics first. */
export function recentTopics(history: PostHistory, count = 10): string[] {
  return history.posts
    .slice(-count)
    .reverse()
    .map((p) => p.topic);
}
