/**
 * @file src/store/tagPersistence.ts
 * @description Reads and atomically rewrites the JSON document that holds every tag namespace.
 *
 *   Saves go to a freshly created temporary file in the target's directory, which is flushed and then
 *   renamed over the target, so readers only ever see a complete document and a crash mid-save leaves
 *   the previous one in place.
 *   Document layout: `{ [namespace]: { [tagName]: { name, content, owner_id, uses, location, created_at } } }`.
 */

import { randomUUID } from "crypto";
import fs from "fs/promises";
import { basename, dirname, join } from "path";
import { z } from "zod";
import type { NamespaceMap, Tag } from "@/types/index.js";
import logger from "../utils/logger.js";
import { locationOf } from "../utils/tagValidation.js";
import { TagPersistenceError, TagStoreLoadError } from "./tagErrors.js";

// Owner ids are 64-bit snowflakes and do not survive JSON.parse as numbers, so their digits are
// quoted before parsing and unquoted after serialising. Quotes inside string values are always
// escaped, so only real `owner_id` keys match.
const OWNER_ID_NUMBER = /"owner_id"(\s*):(\s*)(\d+)/g;
const OWNER_ID_STRING = /"owner_id"(\s*):(\s*)"(\d+)"/g;

const TagRecordSchema = z.object({
  name: z.string().optional(),
  content: z.string(),
  owner_id: z.union([
    z.string().regex(/^\d+$/, "owner_id must be a non-negative integer"),
    z.number().int().nonnegative(),
  ]),
  uses: z.number().int().nonnegative().optional(),
  location: z.string().nullable().optional(),
  created_at: z.string().datetime({ offset: true }).optional(),
});

const TagDocumentSchema = z.record(z.string(), z.record(z.string(), TagRecordSchema));

type TagRecord = z.infer<typeof TagRecordSchema>;

function toTag(namespace: string, key: string, record: TagRecord): Tag {
  const location = locationOf(namespace);
  if (record.name !== undefined && record.name !== key) {
    logger.warn(
      `[tagPersistence] Tag "${key}" in ${namespace} carries name "${record.name}"; using "${key}"`
    );
  }
  if (record.location != null && locationOf(record.location) !== location) {
    logger.warn(
      `[tagPersistence] Tag "${key}" in ${namespace} carries location "${record.location}"; using its namespace`
    );
  }
  return {
    name: key,
    content: record.content,
    ownerId: String(record.owner_id),
    uses: record.uses ?? 0,
    location,
    createdAt:
      record.created_at !== undefined ? new Date(record.created_at) : new Date(),
  };
}

/**
 * Read the tag document at `filePath`.
 * @returns The namespace map, or an empty one when the file does not exist yet.
 * @throws {TagStoreLoadError} When the file cannot be read, is not JSON, or has the wrong shape.
 */
export async function loadTags(filePath: string): Promise<NamespaceMap> {
  logger.debug(`[tagPersistence] loadTags invoked for ${filePath}`);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      logger.info(`🗂️ No tag file at ${filePath}; starting with no tags`);
      return new Map();
    }
    throw new TagStoreLoadError(filePath, "file could not be read", { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.replace(OWNER_ID_NUMBER, '"owner_id"$1:$2"$3"'));
  } catch (err) {
    throw new TagStoreLoadError(filePath, "file is not valid JSON", { cause: err });
  }

  const result = TagDocumentSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new TagStoreLoadError(filePath, `invalid tag document (${details})`, {
      cause: result.error,
    });
  }

  const namespaces: NamespaceMap = new Map();
  let count = 0;
  for (const [namespace, records] of Object.entries(result.data)) {
    const tags = new Map<string, Tag>();
    for (const [key, record] of Object.entries(records)) {
      tags.set(key, toTag(namespace, key, record));
      count += 1;
    }
    namespaces.set(namespace, tags);
  }
  logger.info(`✅ Loaded ${count} tag(s) in ${namespaces.size} namespace(s)`);
  return namespaces;
}

/**
 * Serialise the namespace map into the on-disk document.
 */
export function serializeTags(namespaces: NamespaceMap): string {
  const document: Record<string, Record<string, Record<string, unknown>>> = {};
  for (const [namespace, tags] of namespaces) {
    const records: Record<string, Record<string, unknown>> = {};
    for (const [key, tag] of tags) {
      records[key] = {
        name: tag.name,
        content: tag.content,
        owner_id: tag.ownerId,
        uses: tag.uses,
        location: tag.location,
        created_at: tag.createdAt.toISOString(),
      };
    }
    document[namespace] = records;
  }
  return JSON.stringify(document, null, 2).replace(
    OWNER_ID_STRING,
    '"owner_id"$1:$2$3'
  );
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await fs.unlink(tempPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
      logger.warn(`[tagPersistence] Could not remove temp file ${tempPath}:`, err);
    }
  }
}

/**
 * Atomically replace the tag document at `filePath` with the full contents of `namespaces`.
 * @throws {TagPersistenceError} When any step fails; the previous document is left untouched.
 */
export async function saveTags(
  filePath: string,
  namespaces: NamespaceMap
): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);
  logger.debug(`[tagPersistence] saveTags writing ${tempPath}`);

  try {
    await fs.mkdir(dir, { recursive: true });
    const handle = await fs.open(tempPath, "wx");
    try {
      await handle.writeFile(serializeTags(namespaces), "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await removeTempFile(tempPath);
    logger.error(`[tagPersistence] Failed to save tags to ${filePath}:`, err);
    throw new TagPersistenceError(filePath, { cause: err });
  }
  logger.debug(`[tagPersistence] Saved tags to ${filePath}`);
}
