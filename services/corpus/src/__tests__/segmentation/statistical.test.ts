import { describe, it, expect } from "vitest";
import {
  createStatisticalSegmenter,
  loadCompromiseModel,
  locateBoundaries,
} from "../../segmentation/statistical.js";
import type { SentenceModel } from "../../segmentation/types.js";

const splitOn = (sentences: string[]): SentenceModel => () => sentences;

describe("locateBoundaries", () => {
  it("finds each sentence start from a moving cursor", () => {
    expect(locateBoundaries("Yes. Yes. No.", ["Yes.", "Yes.", "No."])).toEqual([0, 5, 10]);
  });

  it("skips sentences it cannot find", () => {
    expect(locateBoundaries("One two three. Four five.", ["One two three.", "Six seven."])).toEqual([0]);
  });

  it("matches on the leading words when the model altered whitespace", () => {
    const text = "A b c\nd e. F g h i.";
    expect(locateBoundaries(text, ["A b c d e.", "F g h i."])).toEqual([0, 11]);
  });
});

describe("createStatisticalSegmenter", () => {
  it("reports statistical mode", () => {
    expect(createStatisticalSegmenter(splitOn([])).mode).toBe("statistical");
  });

  it("cuts the original text where the model starts sentences", () => {
    const segmenter = createStatisticalSegmenter(splitOn(["The cat sat down.", "The dog ran away."]));
    expect(segmenter.segment("The cat sat down. The dog ran away.")).toEqual([
      "The cat sat down.",
      "The dog ran away.",
    ]);
  });

  it("keeps the text whole when no sentence can be located", () => {
    const segmenter = createStatisticalSegmenter(splitOn(["Something else entirely."]));
    expect(segmenter.segment("One sentence. Another one.")).toEqual(["One sentence. Another one."]);
  });

  it("ignores boundaries right after an extra abbreviation", () => {
    const model = splitOn(["See sect.", "Four is next."]);
    const text = "See sect. Four is next.";
    expect(createStatisticalSegmenter(model).segment(text)).toEqual(["See sect.", "Four is next."]);
    expect(createStatisticalSegmenter(model, new Set(["sect"])).segment(text)).toEqual([text]);
  });

  it("returns nothing for blank text without calling the model", () => {
    const segmenter = createStatisticalSegmenter(() => {
      throw new Error("model called");
    });
    expect(segmenter.segment("  ")).toEqual([]);
  });
});

describe("loadCompromiseModel", () => {
  it("splits plain sentences", async () => {
    const segmenter = createStatisticalSegmenter(await loadCompromiseModel());
    expect(segmenter.segment("The cat sat down. The dog ran away.")).toEqual([
      "The cat sat down.",
      "The dog ran away.",
    ]);
  });
});
