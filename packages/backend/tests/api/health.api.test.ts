import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";
import { InMemoryVectorStore } from "../../src/store/InMemoryVectorStore.js";
import { FakeOllama } from "../helpers/fakeOllama.js";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

class OfflineStore extends InMemoryVectorStore {
  override async healthCheck(): Promise<boolean> {
    return false;
  }
}

describe("health api", () => {
  let testApp: TestApp | null = null;

  afterEach(async () => {
    await testApp?.context.dispose();
    testApp = null;
  });

  it("returns ok when the store and both models are available", async () => {
    testApp = createTestApp();

    const response = await request(testApp.app).get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({
      collection: { status: "ok", documentCount: 0, chunkCount: 0 },
      generation: {
        status: "ok",
        model: "llama3:8b",
        modelAvailable: true,
        embeddingModel: "nomic-embed-text",
        embeddingModelAvailable: true
      }
    });
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("reports the embedding model in use until a restart applies a new one", async () => {
    testApp = createTestApp();
    await request(testApp.app).put("/api/config").send({ embeddingModel: "mxbai-embed-large" });

    const response = await request(testApp.app).get("/api/health");

    expect(testApp.settings.get().embeddingModel).toBe("mxbai-embed-large");
    expect(response.body.checks.generation).toMatchObject({
      embeddingModel: "nomic-embed-text",
      embeddingModelAvailable: true
    });
  });

  it("is degraded when the embedding model is not installed", async () => {
    testApp = createTestApp({ ollama: new FakeOllama({ models: ["llama3:8b"] }) });

    const response = await request(testApp.app).get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks.generation.embeddingModelAvailable).toBe(false);
  });

  it("is degraded when the generation endpoint is unreachable", async () => {
    const ollama = new FakeOllama();
    ollama.unreachable = true;
    testApp = createTestApp({ ollama });

    const response = await request(testApp.app).get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks.generation.status).toBe("failed");
  });

  it("reports an error when the vector store is down", async () => {
    testApp = createTestApp({ backend: new OfflineStore() });

    const response = await request(testApp.app).get("/api/health");

    expect(response.status).toBe(503);
    expect(response.body.status).toBe("error");
    expect(response.body.checks.collection).toEqual({ status: "failed", documentCount: 0, chunkCount: 0 });
  });
});
