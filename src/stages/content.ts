/**
 * Helpers shared by the stages: artifact bytes, content types, local output
 * paths and the list of object keys a run has published.
 */

import { readFile } from 'fs/promises';
import { extname, isAbsolute, relative, resolve, sep } from 'path';
import { z } from 'zod';
import { Artifact } from '../domain/artifact';
import { PermanentStageError } from '../engine/failure';

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.mjs': 'application/javascript',
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.xml': 'application/xml',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon',
  '.pdf': 'application/pdf',
  '.mp4': 'video/mp4',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
};

/** MIME type from a file name; application/octet-stream when unknown. */
export function guessContentType(fileName: string): string {
  return CONTENT_TYPES[extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

/** The artifact's bytes, read from its source path when not loaded yet. */
export async function loadContent(artifact: Artifact): Promise<Buffer> {
  if (artifact.content) return artifact.content;
  try {
    return await readFile(artifact.sourcePath);
  } catch (err) {
    throw new PermanentStageError(`Cannot read source file ${artifact.sourcePath}`, {
      code: typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined,
      cause: err,
    });
  }
}

/**
 * Join `relativePath` onto `root`, refusing a result outside `root`. Object
 * keys end up in local paths, so a key like "../../etc/passwd" must not
 * escape the output directory.
 */
export function resolveWithin(root: string, relativePath: string): string {
  const base = resolve(root);
  const target = resolve(base, relativePath);
  const rel = relative(base, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new PermanentStageError(`Path ${relativePath} resolves outside ${root}`);
  }
  return target;
}

/** Artifact attribute holding a JSON array of every object key the run uploaded. */
export const PUBLISHED_KEYS_ATTRIBUTE = 'publishedKeys';

const keyListSchema = z.array(z.string().min(1));

/** Parse a JSON list of keys or paths kept in an attribute or effect resource. */
export function parseKeyList(value: unknown, what: string): string[] {
  if (typeof value !== 'string') {
    throw new PermanentStageError(`${what} is missing`);
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch (err) {
    throw new PermanentStageError(`${what} is not valid JSON`, { cause: err });
  }
  const parsed = keyListSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new PermanentStageError(`${what} is not a list of strings`);
  }
  return parsed.data;
}

/** Keys uploaded so far, oldest first. */
export function publishedKeys(artifact: Artifact): string[] {
  const raw = artifact.attributes[PUBLISHED_KEYS_ATTRIBUTE];
  return raw === undefined ? [] : parseKeyList(raw, `Attribute ${PUBLISHED_KEYS_ATTRIBUTE} of ${artifact.id}`);
}

/** Attributes with `keys` appended to the published list; a key is listed once. */
export function withPublishedKeys(artifact: Artifact, keys: string[]): Record<string, string> {
  const merged = [...publishedKeys(artifact)];
  for (const key of keys) {
    if (!merged.includes(key)) merged.push(key);
  }
  return { ...artifact.attributes, [PUBLISHED_KEYS_ATTRIBUTE]: JSON.stringify(merged) };
}
