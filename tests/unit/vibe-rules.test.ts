import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  buildClassificationIdentity,
  classifyByKeywords,
  loadKeywordGroups
} from "../../pipeline/services/vibe-rules.js";

describe("classifyByKeywords", () => {
  it("matches whole words in title and description", () => {
    expect(classifyByKeywords("Sunrise Yoga in the Park", "")).toBe("wellness_mindfulness");
    expect(classifyByKeywords("Pier session", "Live   music all evening")).toBe("music_concert");
    expect(classifyByKeywords("Artisanal bread", "")).toBe("other");
  });

  it("lets earlier groups win when several match", () => {
    expect(classifyByKeywords("AI Founders Breakfast", "")).toBe("business_networking");
  });

  it("defaults to other for empty text", () => {
    expect(classifyByKeywords("", "   ")).toBe("other");
  });

  it("loads custom keyword groups from a file", () => {
    const tmpDir = mkdtempSync(join(tmpdir(), "event-vibe-rules-"));

    try {
      const valid = join(tmpDir, "groups.json");
      writeFileSync(valid, JSON.stringify({ groups: [{ category: "food_drink", keywords: ["durian"] }] }));
      const invalid = join(tmpDir, "invalid.json");
      writeFileSync(invalid, JSON.stringify({ groups: [{ category: "gardening", keywords: ["soil"] }] }));

      expect(classifyByKeywords("Durian Feast", "", loadKeywordGroups(valid))).toBe("food_drink");
      expect(classifyByKeywords("Sunrise Yoga", "", loadKeywordGroups(valid))).toBe("other");
      expect(() => loadKeywordGroups(invalid)).toThrow();
    } finally {
      rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

describe("buildClassificationIdentity", () => {
  it("uses the URL when there is one", () => {
    expect(
      buildClassificationIdentity({ url: " https://e.test/1 ", title: "Jazz", description: "" })
    ).toBe("url:https://e.test/1");
  });

  it("hashes title and description otherwise", () => {
    const identity = buildClassificationIdentity({ url: "", title: "Jazz", description: "Live" });

    expect(identity).toMatch(/^hash:[0-9a-f]{40}$/);
    expect(buildClassificationIdentity({ url: "  ", title: "Jazz", description: "Live" })).toBe(identity);
    expect(buildClassificationIdentity({ url: "", title: "Jazz", description: "Other" })).not.toBe(identity);
  });
});
