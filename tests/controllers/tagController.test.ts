import fs from "fs/promises";
import os from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  describeTagError,
  runTagCommand,
  type TagCommand,
  type TagCommandContext,
  type TagReply,
} from "../../src/controllers/tagController.js";
import { TagPersistenceError } from "../../src/store/tagErrors.js";
import { TagStore } from "../../src/store/tagStore.js";

const alice: TagCommandContext = { guildId: "555", userId: "1" };
const bob: TagCommandContext = { guildId: "555", userId: "2" };

function textOf(reply: TagReply): { content: string; isError: boolean } {
  if (reply.type !== "text") throw new Error("expected a text reply");
  return { content: reply.content, isError: reply.isError };
}

describe("runTagCommand", () => {
  let dir: string;
  let store: TagStore;
  const lookupOwner = vi.fn(async (_ownerId: string) => ({ name: "alice" }));

  const run = (command: TagCommand, ctx: TagCommandContext = alice) =>
    runTagCommand(store, command, ctx, lookupOwner);

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(os.tmpdir(), "tag-controller-"));
    store = await TagStore.open(join(dir, "tags.json"));
    lookupOwner.mockClear();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("confirms creation and lists the new tag", async () => {
    expect(textOf(await run({ kind: "list" }))).toEqual({
      content: "No tags available.",
      isError: false,
    });

    await run({ kind: "create", name: "welcome", content: "Hi!" });
    const created = await run({ kind: "create", name: "rules", content: "Be nice" });
    expect(textOf(created)).toEqual({
      content: 'Tag "rules" successfully created.',
      isError: false,
    });

    expect(textOf(await run({ kind: "list" })).content).toBe(
      "Available tags: rules, welcome"
    );
  });

  it("replies with the content when a tag is used and counts the use", async () => {
    await run({ kind: "create", name: "welcome", content: "Hi!" });

    expect(textOf(await run({ kind: "use", name: "welcome" }, bob))).toEqual({
      content: "Hi!",
      isError: false,
    });
    const fetched = await store.getTag("555", "welcome");
    expect(fetched.ok && fetched.value.uses).toBe(1);
  });

  it("renders info as an embed with the owner's profile", async () => {
    await run({ kind: "create", name: "welcome", content: "Hi!" });

    const reply = await run({ kind: "info", name: "welcome" }, bob);

    if (reply.type !== "embed") throw new Error("expected an embed reply");
    expect(reply.embed.data.title).toBe("welcome");
    expect(reply.embed.data.author?.name).toBe("alice");
    expect(reply.embed.data.footer?.text).toBe("Server-specific");
    expect(lookupOwner).toHaveBeenCalledWith("1");
  });

  it("reports a missing tag without looking up an owner", async () => {
    expect(textOf(await run({ kind: "info", name: "nope" }))).toEqual({
      content: 'Tag "nope" not found.',
      isError: true,
    });
    expect(lookupOwner).not.toHaveBeenCalled();
  });

  it("refuses edits and deletes from someone other than the owner", async () => {
    await run({ kind: "create", name: "welcome", content: "Hi!" });

    expect(
      textOf(await run({ kind: "edit", name: "welcome", content: "Mine now" }, bob))
    ).toEqual({ content: "You do not have permission to do that.", isError: true });
    expect(textOf(await run({ kind: "delete", name: "welcome" }, bob))).toEqual({
      content: "You do not have permission to do that.",
      isError: true,
    });
  });

  it("confirms edits and deletes by the owner", async () => {
    await run({ kind: "create", name: "welcome", content: "Hi!" });

    expect(
      textOf(await run({ kind: "edit", name: "welcome", content: "Hello!" })).content
    ).toBe('Tag "welcome" successfully updated.');
    expect(textOf(await run({ kind: "use", name: "welcome" })).content).toBe("Hello!");
    expect(textOf(await run({ kind: "delete", name: "welcome" })).content).toBe(
      'Tag "welcome" successfully deleted.'
    );
    expect(textOf(await run({ kind: "list" })).content).toBe("No tags available.");
  });

  it("explains validation and duplicate failures", async () => {
    expect(
      textOf(await run({ kind: "create", name: "@everyone-ping", content: "x" }))
    ).toEqual({ content: "Tag contains blocked words.", isError: true });

    await run({ kind: "create", name: "welcome", content: "Hi!" });
    expect(
      textOf(await run({ kind: "create", name: "welcome", content: "again" }, bob))
    ).toEqual({ content: 'Tag "welcome" already exists.', isError: true });
  });
});

describe("describeTagError", () => {
  it("never reports a failed save as success", () => {
    expect(describeTagError(new TagPersistenceError("/tmp/tags.json"))).toBe(
      "⚠️ The change took effect but could not be saved to disk yet; it will be written with the next successful save."
    );
  });
});
