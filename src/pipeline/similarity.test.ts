import {
  ExponentialSimilarity,
  LinearSimilarity,
  createSimilarityPolicy,
  euclideanDistance,
} from "./similarity";

describe("euclideanDistance", () => {
  it("measures straight-line distance", () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(euclideanDistance([1, 2, 3], [1, 2, 3])).toBe(0);
  });

  it("rejects vectors of different length", () => {
    expect(() => euclideanDistance([1], [1, 2])).toThrow("Vectors must have the same length (1 vs 2)");
  });
});

describe("ExponentialSimilarity", () => {
  it("scores 100 at distance zero and decays with distance", () => {
    const policy = new ExponentialSimilarity();

    expect(policy.score(0)).toBe(100);
    expect(policy.score(1)).toBeCloseTo(36.788, 3);
    expect(policy.score(2)).toBeLessThan(policy.score(1));
    expect(policy.score(1000)).toBeGreaterThanOrEqual(0);
  });

  it("stretches with scale", () => {
    expect(new ExponentialSimilarity(2).score(2)).toBeCloseTo(new ExponentialSimilarity().score(1), 10);
  });
});

describe("LinearSimilarity", () => {
  it("subtracts the scaled distance from 100", () => {
    const policy = new LinearSimilarity();

    expect(policy.score(0)).toBe(100);
    expect(policy.score(0.25)).toBe(75);
  });

  it("floors the score at 0", () => {
    expect(new LinearSimilarity().score(2)).toBe(0);
  });
});

describe("createSimilarityPolicy", () => {
  it("builds the requested policy", () => {
    expect(createSimilarityPolicy("linear").name).toBe("linear");
    expect(createSimilarityPolicy("exponential").name).toBe("exponential");
    expect(createSimilarityPolicy("linear", 10).score(1)).toBe(90);
  });
});
