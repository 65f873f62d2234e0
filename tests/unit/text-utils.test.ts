import { describe, expect, it } from "vitest";
import {
  createEmptyEventFields,
  type DiscoveryRecord,
  type EventFields
} from "../../packages/shared/src/contracts.js";
import {
  canonicalizeUrl,
  clampText,
  dedupeByUrl,
  firstNonEmpty,
  fuseLayers,
  isHttpUrl,
  mergeFillEmpty,
  normalizeWhitespace
} from "../../packages/shared/src/text-utils.js";

const fields = (overrides: Partial<EventFields> = {}): EventFields => ({
  ...createEmptyEventFields(),
  ...overrides
});

describe("normalizeWhitespace", () => {
  it("collapses runs of whitespace and trims", () => {
    expect(normalizeWhitespace("  Rooftop\n\t Jazz   Night ")).toBe("Rooftop Jazz Night");
  });

  it("treats null and undefined as empty", () => {
    expect(normalizeWhitespace(null)).toBe("");
    expect(normalizeWhitespace(undefined)).toBe("");
  });
});

describe("firstNonEmpty", () => {
  it("returns the first value with visible text", () => {
    expect(firstNonEmpty(undefined, "   ", " Esplanade ", "Other")).toBe("Esplanade");
    expect(firstNonEmpty(null, "")).toBe("");
  });
});

describe("clampText", () => {
  it("truncates long text with an ellipsis", () => {
    expect(clampText("abcdefgh", 5)).toBe("abcde...");
    expect(clampText("abc", 5)).toBe("abc");
  });
});

describe("mergeFillEmpty", () => {
  it("keeps every non-empty base value", () => {
    const merged = mergeFillEmpty(fields({ title: "Base title", price: "25" }), {
      title: "Patch title",
      price: "30"
    });

    expect(merged.title).toBe("Base title");
    expect(merged.price).toBe("25");
  });

  it("fills empty and whitespace-only base values from the patch", () => {
    const merged = mergeFillEmpty(fields({ location: "   " }), {
      location: "Esplanade",
      description: "An evening of jazz"
    });

    expect(merged.location).toBe("Esplanade");
    expect(merged.description).toBe("An evening of jazz");
  });

  it("never replaces a value with an empty patch value", () => {
    const merged = mergeFillEmpty(fields({ title: "" }), { title: "  " });
    expect(merged.title).toBe("");
  });

  it("adopts keys the base does not have", () => {
    const base: { title: string; capacity?: string } = { title: "Gig" };
    expect(mergeFillEmpty(base, { capacity: "Sold out" })).toEqual({
      title: "Gig",
      capacity: "Sold out"
    });
  });

  it("does not mutate its inputs", () => {
    const base = fields();
    mergeFillEmpty(base, { title: "Filled" });
    expect(base.title).toBe("");
  });
});

describe("fuseLayers", () => {
  it("lets earlier layers win and later layers fill gaps", () => {
    const fused = fuseLayers(fields(), [
      { price: "25" },
      { price: "SGD 25.50", title: "From meta" },
      { title: "From DOM", location: "Hall 1" }
    ]);

    expect(fused.price).toBe("25");
    expect(fused.title).toBe("From meta");
    expect(fused.location).toBe("Hall 1");
  });
});

describe("canonicalizeUrl", () => {
  it("resolves relative hrefs against the page URL", () => {
    expect(canonicalizeUrl("/event/7?ref=list", "https://peatix.com/search?p=2")).toBe(
      "https://peatix.com/event/7?ref=list"
    );
  });

  it("returns an empty string for missing or unparseable hrefs", () => {
    expect(canonicalizeUrl(undefined, "https://peatix.com/")).toBe("");
    expect(canonicalizeUrl("http://[broken", "https://peatix.com/")).toBe("");
  });
});

describe("isHttpUrl", () => {
  it("accepts http and https only", () => {
    expect(isHttpUrl("https://x.test/event/1")).toBe(true);
    expect(isHttpUrl("mailto:hello@x.test")).toBe(false);
    expect(isHttpUrl("not a url")).toBe(false);
  });
});

describe("dedupeByUrl", () => {
  it("collapses identical URLs to the first record", () => {
    const rows: DiscoveryRecord[] = [
      { url: "https://x.test/event/1?ref=a", title: "First", source: "peatix" },
      { url: "https://x.test/event/1?ref=a", title: "Second", source: "peatix" }
    ];

    expect(dedupeByUrl(rows)).toEqual([
      { url: "https://x.test/event/1?ref=a", title: "First", source: "peatix" }
    ]);
  });

  it("preserves first-seen order and drops rows without a URL", () => {
    const rows: DiscoveryRecord[] = [
      { url: "https://x.test/event/2", title: "B", source: "peatix" },
      { url: "", title: "No URL", source: "peatix" },
      { url: "https://x.test/event/1", title: "A", source: "peatix" },
      { url: "https://x.test/event/2", title: "B again", source: "peatix" }
    ];

    expect(dedupeByUrl(rows).map((row) => row.title)).toEqual(["B", "A"]);
  });
});
