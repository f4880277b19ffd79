import { describe, expect, it } from "vitest";

import type { Tag } from "../../src/types/index.js";
import { buildTagEmbed } from "../../src/utils/tagEmbed.js";

const baseTag: Tag = {
  name: "welcome",
  content: "Hi!",
  ownerId: "42",
  uses: 3,
  location: null,
  createdAt: new Date("2024-05-01T12:00:00.000Z"),
};

describe("buildTagEmbed", () => {
  it("renders name, owner, uses, creation time and scope", () => {
    const { data } = buildTagEmbed(baseTag);

    expect(data.title).toBe("welcome");
    expect(data.fields).toEqual([
      { name: "Owner", value: "<@!42>" },
      { name: "Uses", value: "3" },
    ]);
    expect(data.timestamp).toBe("2024-05-01T12:00:00.000Z");
    expect(data.footer?.text).toBe("Generic");
    expect(data.author).toBeUndefined();
  });

  it("labels guild tags as server-specific", () => {
    const { data } = buildTagEmbed({ ...baseTag, location: "555" });
    expect(data.footer?.text).toBe("Server-specific");
  });

  it("shows the owner's name and avatar when known", () => {
    const { data } = buildTagEmbed(baseTag, {
      name: "alice",
      avatarUrl: "https://cdn.example.com/alice.png",
    });

    expect(data.author?.name).toBe("alice");
    expect(data.author?.icon_url).toBe("https://cdn.example.com/alice.png");
  });
});
