/**
 * @file src/store/tagStore.ts
 * @description The tag store: generic and per-guild tag namespaces held in memory, guarded by a
 *   single lock, and written through to disk after every mutation.
 * @remarks
 *   Every operation runs its whole read-validate-mutate-save sequence under the same {@link Mutex},
 *   so concurrent commands never interleave. Rejected operations change nothing and skip the save.
 *   Tags handed to callers are copies; the store's own records never leave the lock.
 */

import type { GuildContext, NamespaceMap, Tag } from "@/types/index.js";
import logger from "../utils/logger.js";
import {
  GENERIC_NAMESPACE,
  namespaceFor,
  normalizeTagName,
  verifyOwnerId,
  verifyTagContent,
  verifyTagName,
} from "../utils/tagValidation.js";
import { Mutex } from "./mutex.js";
import {
  DuplicateTagError,
  fail,
  ok,
  TagNotFoundError,
  TagPermissionError,
  TagPersistenceError,
  type TagResult,
} from "./tagErrors.js";
import { loadTags, saveTags } from "./tagPersistence.js";

function copyTag(tag: Tag): Tag {
  return { ...tag, createdAt: new Date(tag.createdAt.getTime()) };
}

interface ResolvedTag {
  namespace: string;
  tag: Tag;
}

export class TagStore {
  private readonly lock = new Mutex();

  constructor(
    readonly filePath: string,
    private readonly namespaces: NamespaceMap = new Map()
  ) {}

  /**
   * Load the tag file and build a store around it.
   * @throws {TagStoreLoadError} When the file exists but is unreadable or corrupt.
   */
  static async open(filePath: string): Promise<TagStore> {
    const namespaces = await loadTags(filePath);
    return new TagStore(filePath, namespaces);
  }

  /**
   * Tags visible from `guildId`: generic tags overlaid with the guild's own, the guild winning on
   * a shared name. Without a guild only generic tags are visible.
   */
  resolveVisibleTags(guildId: GuildContext): Promise<Map<string, Tag>> {
    return this.lock.runExclusive(async () => {
      const visible = new Map<string, Tag>();
      for (const { tag } of this.visibleEntries(guildId).values()) {
        visible.set(tag.name, copyTag(tag));
      }
      return visible;
    });
  }

  /**
   * Look up a visible tag by name.
   */
  getTag(guildId: GuildContext, name: string): Promise<TagResult<Tag>> {
    return this.lock.runExclusive(async () => {
      const key = normalizeTagName(name);
      const resolved = this.visibleEntries(guildId).get(key);
      if (!resolved) return fail<Tag>(new TagNotFoundError(key));
      return ok(copyTag(resolved.tag));
    });
  }

  /**
   * Create a tag in the caller's namespace: the guild's when `guildId` is set, generic otherwise.
   * A generic tag of the same name does not block a guild tag; it gets shadowed instead.
   */
  createTag(
    guildId: GuildContext,
    name: string,
    content: string,
    ownerId: string
  ): Promise<TagResult<Tag>> {
    return this.lock.runExclusive(async () => {
      const key = normalizeTagName(name);
      const invalid =
        verifyTagName(key) ?? verifyTagContent(content) ?? verifyOwnerId(ownerId);
      if (invalid) return fail<Tag>(invalid);

      const namespace = namespaceFor(guildId);
      const bucket = this.bucket(namespace);
      if (bucket.has(key)) return fail<Tag>(new DuplicateTagError(key));

      const tag: Tag = {
        name: key,
        content,
        ownerId,
        uses: 0,
        location: guildId,
        createdAt: new Date(),
      };
      bucket.set(key, tag);
      logger.info(`🏷️ Tag "${key}" created in ${namespace} by ${ownerId}`);
      return this.persist(tag);
    });
  }

  /**
   * Replace the content of a tag the requester owns. The tag keeps its namespace, even when it is a
   * generic tag edited from inside a guild.
   */
  editTag(
    guildId: GuildContext,
    name: string,
    newContent: string,
    requesterId: string
  ): Promise<TagResult<Tag>> {
    return this.lock.runExclusive(async () => {
      const owned = this.resolveOwned(guildId, name, requesterId);
      if (!owned.ok) return owned;
      const invalid = verifyTagContent(newContent);
      if (invalid) return fail<Tag>(invalid);

      const { namespace, tag } = owned.value;
      tag.content = newContent;
      logger.info(`✏️ Tag "${tag.name}" in ${namespace} edited by ${requesterId}`);
      return this.persist(tag);
    });
  }

  /**
   * Remove a tag the requester owns from its namespace.
   * @returns The removed tag.
   */
  deleteTag(
    guildId: GuildContext,
    name: string,
    requesterId: string
  ): Promise<TagResult<Tag>> {
    return this.lock.runExclusive(async () => {
      const owned = this.resolveOwned(guildId, name, requesterId);
      if (!owned.ok) return owned;

      const { namespace, tag } = owned.value;
      this.bucket(namespace).delete(tag.name);
      logger.info(`🗑️ Tag "${tag.name}" deleted from ${namespace} by ${requesterId}`);
      return this.persist(tag);
    });
  }

  /**
   * Record one invocation of a visible tag.
   * @returns The tag with its updated use count.
   */
  incrementUse(guildId: GuildContext, name: string): Promise<TagResult<Tag>> {
    return this.lock.runExclusive(async () => {
      const key = normalizeTagName(name);
      const resolved = this.visibleEntries(guildId).get(key);
      if (!resolved) return fail<Tag>(new TagNotFoundError(key));

      resolved.tag.uses += 1;
      logger.debug(
        `[tagStore] Tag "${key}" in ${resolved.namespace} used, uses=${resolved.tag.uses}`
      );
      return this.persist(resolved.tag);
    });
  }

  /**
   * Names of the visible tags in ascending order.
   */
  listTags(guildId: GuildContext): Promise<string[]> {
    return this.lock.runExclusive(async () =>
      [...this.visibleEntries(guildId).keys()].sort()
    );
  }

  /**
   * Resolves once every operation queued so far has finished.
   */
  flush(): Promise<void> {
    return this.lock.drain();
  }

  // Callers must hold the lock for everything below.

  private visibleEntries(guildId: GuildContext): Map<string, ResolvedTag> {
    const visible = new Map<string, ResolvedTag>();
    const scopes =
      guildId === null ? [GENERIC_NAMESPACE] : [GENERIC_NAMESPACE, guildId];
    for (const namespace of scopes) {
      const bucket = this.namespaces.get(namespace);
      if (!bucket) continue;
      for (const [key, tag] of bucket) {
        visible.set(key, { namespace, tag });
      }
    }
    return visible;
  }

  private resolveOwned(
    guildId: GuildContext,
    name: string,
    requesterId: string
  ): TagResult<ResolvedTag> {
    const key = normalizeTagName(name);
    const resolved = this.visibleEntries(guildId).get(key);
    if (!resolved) return fail<ResolvedTag>(new TagNotFoundError(key));
    if (resolved.tag.ownerId !== requesterId) {
      logger.debug(
        `[tagStore] ${requesterId} denied access to "${key}" owned by ${resolved.tag.ownerId}`
      );
      return fail<ResolvedTag>(new TagPermissionError(key, requesterId));
    }
    return ok(resolved);
  }

  private bucket(namespace: string): Map<string, Tag> {
    let bucket = this.namespaces.get(namespace);
    if (!bucket) {
      bucket = new Map();
      this.namespaces.set(namespace, bucket);
    }
    return bucket;
  }

  private async persist(tag: Tag): Promise<TagResult<Tag>> {
    try {
      await saveTags(this.filePath, this.namespaces);
    } catch (err) {
      if (err instanceof TagPersistenceError) return fail<Tag>(err);
      throw err;
    }
    return ok(copyTag(tag));
  }
}
