import { describe, expect, it } from "vitest";
import { EmbeddingProvider } from "../src/infra/ai/types.js";
import { EmbeddingGateway } from "../src/pipelines/embeddingGateway.js";
import { FakeEmbeddingProvider } from "./helpers/fakes.js";

describe("EmbeddingGateway", () => {
  it("keeps output aligned with input and zero-fills failures", async () => {
    const gateway = new EmbeddingGateway(new FakeEmbeddingProvider(4, new Set(["bad"])), {
      dimension: 4,
      concurrency: 2,
    });

    const vectors = await gateway.embedMany(["ab", "bad", "cde"]);

    expect(vectors).toEqual([
      [2, 1, 1, 0],
      [0, 0, 0, 0],
      [3, 1, 1, 0],
    ]);
    expect(gateway.stats()).toEqual({ requests: 3, failures: 1, unreachable: 1, malformed: 0 });
  });

  it("treats a vector of the wrong dimension as malformed", async () => {
    const gateway = new EmbeddingGateway(new FakeEmbeddingProvider(3), { dimension: 4 });

    const embedded = await gateway.embedQuery("hello");

    expect(embedded).toEqual({
      degraded: true,
      vector: [0, 0, 0, 0],
      kind: "malformed",
      reason: "Embedding dimension 3 does not match index dimension 4.",
    });
    expect(gateway.stats().malformed).toBe(1);
  });

  it("maps a thrown provider error to unreachable", async () => {
    const provider: EmbeddingProvider = {
      modelName: "broken",
      embed: async () => {
        throw new Error("ECONNREFUSED");
      },
    };
    const gateway = new EmbeddingGateway(provider, { dimension: 2 });

    expect(await gateway.embed("text")).toEqual([0, 0]);
    const query = await gateway.embedQuery("text");
    expect(query.degraded).toBe(true);
    if (query.degraded) {
      expect(query.kind).toBe("unreachable");
      expect(query.reason).toBe("ECONNREFUSED");
    }
  });

  it("returns the provider vector for a healthy query", async () => {
    const gateway = new EmbeddingGateway(new FakeEmbeddingProvider(3), { dimension: 3 });
    expect(await gateway.embedQuery("io")).toEqual({ degraded: false, vector: [2, 2, 1] });
  });

  it("returns an empty list without calling the provider", async () => {
    const provider = new FakeEmbeddingProvider(3);
    const gateway = new EmbeddingGateway(provider, { dimension: 3 });
    expect(await gateway.embedMany([])).toEqual([]);
    expect(provider.calls).toEqual([]);
  });
});
