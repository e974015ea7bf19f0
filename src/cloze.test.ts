import { describe, it, expect } from "vitest";
import { BLANK_MARKER, ClozeTrainer, blankTerm, characterSimilarity, ratingFromSimilarity } from "./cloze.js";
import { createItem } from "./scheduler.js";
import { GenerationUnavailableError } from "./errors.js";
import type { SentenceGenerator } from "./generator.js";

function fixedGenerator(sentence: string): SentenceGenerator {
  return { generateSentence: async () => sentence };
}

const paris = createItem({ id: "c1", front: "Paris", back: "Capital of France" });

describe("characterSimilarity", () => {
  it("is Jaccard similarity over character sets", () => {
    expect(characterSimilarity("paris", "paris")).toBe(1);
    expect(characterSimilarity("abc", "abd")).toBe(0.5);
    expect(characterSimilarity("london", "paris")).toBe(0);
  });

  it("scores empty input as 0", () => {
    expect(characterSimilarity("", "paris")).toBe(0);
    expect(characterSimilarity("paris", "")).toBe(0);
  });
});

describe("ratingFromSimilarity", () => {
  it("maps similarity bands to ratings", () => {
    expect(ratingFromSimilarity(0.81)).toBe(5);
    expect(ratingFromSimilarity(0.8)).toBe(4);
    expect(ratingFromSimilarity(0.61)).toBe(4);
    expect(ratingFromSimilarity(0.5)).toBe(3);
    expect(ratingFromSimilarity(0.3)).toBe(2);
    expect(ratingFromSimilarity(0.2)).toBe(1);
    expect(ratingFromSimilarity(0)).toBe(1);
  });
});

describe("blankTerm", () => {
  it("replaces the first case-insensitive occurrence", () => {
    expect(blankTerm("paris, oh Paris", "PARIS")).toEqual({
      sentence: `${BLANK_MARKER}, oh Paris`,
      matchedTerm: "paris",
    });
  });

  it("treats the term literally", () => {
    expect(blankTerm("I write C++ daily", "C++")?.sentence).toBe(`I write ${BLANK_MARKER} daily`);
  });

  it("returns null when the term is missing", () => {
    expect(blankTerm("The cat sat", "dog")).toBeNull();
    expect(blankTerm("The cat sat", "  ")).toBeNull();
  });
});

describe("ClozeTrainer", () => {
  it("blanks the term and accepts it back", async () => {
    const trainer = new ClozeTrainer(paris, fixedGenerator("Paris is the capital of France."));

    await expect(trainer.render()).resolves.toEqual({
      mode: "cloze",
      itemId: "c1",
      front: "Paris",
      sentence: "____________ is the capital of France.",
      prompt: "Fill in the blank with the missing word:",
    });

    const result = trainer.grade("  paris ");
    expect(result.similarity).toBe(1);
    expect(result.rating).toBe(5);
    expect(result.isCorrect).toBe(true);
    expect(result.correctAnswer).toBe("Paris");
  });

  it("expects the casing used in the sentence", async () => {
    const item = createItem({ id: "c2", front: "paris", back: "Capital of France" });
    const trainer = new ClozeTrainer(item, fixedGenerator("We flew to Paris in May."));
    await trainer.render();
    expect(trainer.grade("Paris").correctAnswer).toBe("Paris");
  });

  it("scores near misses by similarity", async () => {
    const trainer = new ClozeTrainer(paris, fixedGenerator("Paris is lovely."));
    await trainer.render();

    // Same character set as "paris"
    expect(trainer.grade("parrris")).toMatchObject({ rating: 5, isCorrect: true });
    expect(trainer.grade("london")).toMatchObject({ rating: 1, isCorrect: false, similarity: 0 });
    expect(trainer.grade("")).toMatchObject({ rating: 1, similarity: 0 });
  });

  it("truncates long sentences", async () => {
    const trainer = new ClozeTrainer(paris, fixedGenerator(`Paris ${"a".repeat(300)}`));
    const prompt = await trainer.render();
    expect(prompt.sentence).toBe(`${BLANK_MARKER} ${"a".repeat(244)}...`);
  });

  it("fails with term_not_found when the sentence lacks the term", async () => {
    const trainer = new ClozeTrainer(paris, fixedGenerator("Berlin is in Germany."));
    const error = await trainer.render().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({ reason: "term_not_found" });
  });

  it("fails explicitly without a generator", async () => {
    const trainer = new ClozeTrainer(paris, null);
    await expect(trainer.render()).rejects.toMatchObject({
      name: "GenerationUnavailableError",
      reason: "generation_unavailable",
    });
  });

  it("wraps generator errors", async () => {
    const generator: SentenceGenerator = {
      generateSentence: async () => {
        throw new Error("rate limited");
      },
    };
    const trainer = new ClozeTrainer(paris, generator);
    await expect(trainer.render()).rejects.toMatchObject({
      reason: "generation_unavailable",
      message: "Sentence generation failed: rate limited",
    });
  });
});
