import { describe, expect, it, vi } from "vitest";
import {
  DEFAULT_REMOVED_VIBE_CATEGORIES,
  createEmptyEventFields,
  type EventRecord
} from "../../packages/shared/src/contracts.js";
import type {
  ClassificationRequest,
  ClassificationService
} from "../../pipeline/services/openai-classification-service.js";
import {
  VibeClassifier,
  parseClassificationResponse
} from "../../pipeline/services/vibe-classifier.js";

const makeEvent = (url: string, title: string, description: string): EventRecord => ({
  ...createEmptyEventFields(),
  source: "peatix",
  url,
  title,
  description,
  fetchMethod: "lightweight"
});

const networking = makeEvent("https://e.test/1", "Networking Mixer for Founders", "");
const yoga = makeEvent("https://e.test/2", "Sunrise Yoga in the Park", "Bring a mat.");
const jazz = makeEvent("https://e.test/3", "Rooftop Jazz Night", "Live jazz with cocktails.");

const createService = (respond: (request: ClassificationRequest) => Promise<string>) => {
  const complete = vi.fn(respond);
  const service: ClassificationService = { complete };
  return { service, complete };
};

describe("VibeClassifier", () => {
  it("labels every event by keywords when the service fails", async () => {
    const { service } = createService(async () => {
      throw new Error("quota exceeded");
    });
    const log = vi.fn();
    const classifier = new VibeClassifier({
      service,
      model: "test-model",
      removeCategories: DEFAULT_REMOVED_VIBE_CATEGORIES,
      sleep: async () => {},
      log
    });

    const result = await classifier.classify([networking, yoga, jazz]);

    expect(result.classified.map((event) => event.vibeCategory)).toEqual([
      "business_networking",
      "wellness_mindfulness",
      "music_concert"
    ]);
    expect(result.removed.map((event) => event.url)).toEqual(["https://e.test/1"]);
    expect(result.kept.map((event) => event.url)).toEqual(["https://e.test/2", "https://e.test/3"]);
    expect(result.fallbackCount).toBe(3);
    expect(log).toHaveBeenCalledWith("[classify] Batch 1/1 failed (quota exceeded); using keyword fallback");
  });

  it("sends batches with a pause between them and fills gaps with keywords", async () => {
    const { service, complete } = createService(
      async () =>
        'Here you go:\n[{"id":"url:https://e.test/1","category":" Food_Drink "},' +
        '{"id":"url:https://e.test/2","category":"brunch"}]\nThanks!'
    );
    const sleep = vi.fn(async () => {});
    const classifier = new VibeClassifier({
      service,
      model: "test-model",
      removeCategories: [],
      batchSize: 2,
      sleep
    });

    const result = await classifier.classify([networking, yoga, jazz]);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1_000);
    expect(result.classified.map((event) => event.vibeCategory)).toEqual([
      "food_drink",
      "wellness_mindfulness",
      "music_concert"
    ]);
    expect(result.fallbackCount).toBe(2);
    expect(result.removed).toEqual([]);
  });

  it("prompts with event identities and clamped descriptions", async () => {
    const { service, complete } = createService(async () => "[]");
    const classifier = new VibeClassifier({ service, model: "test-model", removeCategories: [] });
    const longDescription = "a".repeat(600);

    await classifier.classify([makeEvent("https://e.test/9", "Long Read", longDescription)]);

    const request = complete.mock.calls[0]?.[0];
    expect(request?.model).toBe("test-model");
    expect(request?.prompt).toContain('"id": "url:https://e.test/9"');
    expect(request?.prompt).toContain(`"description": "${"a".repeat(500)}..."`);
  });
});

describe("parseClassificationResponse", () => {
  it("reads an array wrapped in an object", () => {
    expect(parseClassificationResponse('{"results":[{"id":1,"category":"other"}]}')).toEqual(
      new Map([["1", "other"]])
    );
  });

  it("keeps the first answer per id and drops malformed rows", () => {
    const mapping = parseClassificationResponse(
      '[{"id":"a","category":"tech_talk"},{"id":"a","category":"other"},{"id":"b"},"x",' +
        '{"id":"c","category":"SPORTS_FITNESS"}]'
    );

    expect(mapping).toEqual(
      new Map([
        ["a", "tech_talk"],
        ["c", "sports_fitness"]
      ])
    );
  });

  it("reads the first embedded array even when later prose has brackets", () => {
    expect(
      parseClassificationResponse(
        'Labels: [{"id":"url:https://e.test/1","category":"music_concert"}]\nI used [other] where unsure.'
      )
    ).toEqual(new Map([["url:https://e.test/1", "music_concert"]]));
  });

  it("returns an empty mapping for text without JSON", () => {
    expect(parseClassificationResponse("I cannot help with that.").size).toBe(0);
  });
});
