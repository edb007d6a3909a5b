import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempFolder, type TempFolder } from "../helpers/tempFolder.js";
import { createTestApp, sseEventData, sseEventNames, type TestApp } from "../helpers/testApp.js";

describe("qa api", () => {
  let folder: TempFolder;
  let testApp: TestApp;

  beforeEach(async () => {
    folder = await createTempFolder();
    testApp = createTestApp();
    await testApp.context.pipeline.addDocument(
      await folder.write("billing.txt", "Alpha team owns the billing service.")
    );
  });

  afterEach(async () => {
    await testApp.context.dispose();
    await folder.cleanup();
  });

  it("answers a question from the indexed documents", async () => {
    const response = await request(testApp.app)
      .post("/api/qa")
      .send({ question: "Alpha team owns the billing service", parameters: { temperature: 0.1 } });

    expect(response.status).toBe(200);
    expect(response.body.result).toMatchObject({
      query: "Alpha team owns the billing service",
      answer: "The answer is 42.",
      mode: "grounded"
    });
    expect(response.body.result.sources).toHaveLength(1);
    expect(response.body.result.sources[0].filename).toBe("billing.txt");
    expect(response.body.result.sources[0].similarity).toBeCloseTo(1, 6);
    expect(testApp.ollama.requests.at(-1)?.body).toMatchObject({
      model: "llama3:8b",
      stream: false,
      options: { temperature: 0.1, top_p: 0.9 }
    });
  });

  it("streams the answer as server-sent events", async () => {
    const response = await request(testApp.app)
      .post("/api/qa")
      .set("Accept", "text/event-stream")
      .send({ question: "Alpha team owns the billing service", operationId: "qa-1" });

    expect(response.status).toBe(200);
    expect(sseEventNames(response.text)).toEqual([
      "ack",
      "status",
      "status",
      "status",
      "status",
      "delta",
      "delta",
      "delta",
      "delta",
      "sources",
      "status",
      "complete"
    ]);
    expect(sseEventData(response.text, "ack")).toEqual([{ operationId: "qa-1" }]);
    expect(sseEventData(response.text, "status")).toEqual([
      { phase: "received" },
      { phase: "retrieving" },
      { phase: "grounded" },
      { phase: "generating" },
      { phase: "complete" }
    ]);
    expect(sseEventData(response.text, "delta")).toEqual([
      { delta: "The " },
      { delta: "answer " },
      { delta: "is " },
      { delta: "42." }
    ]);
    expect(sseEventData(response.text, "complete")).toMatchObject([
      { result: { answer: "The answer is 42.", mode: "grounded" } }
    ]);
    expect(testApp.context.registry.get("qa-1")).toBeNull();
  });

  it("sends an error event when generation fails mid-stream", async () => {
    testApp.ollama.generateStatus = 500;

    const response = await request(testApp.app)
      .post("/api/qa?stream=true")
      .send({ question: "Alpha team owns the billing service" });

    expect(sseEventNames(response.text)).toEqual(["ack", "status", "status", "status", "status", "status", "error"]);
    expect(sseEventData(response.text, "status").at(-1)).toEqual({ phase: "failed" });
    expect(sseEventData(response.text, "error")).toEqual([
      {
        error: 'Generation with "llama3:8b" failed: model not found',
        code: "QA_GENERATION_FAILED",
        details: { model: "llama3:8b", status: 500 }
      }
    ]);
  });

  it("maps generation failures to 502", async () => {
    testApp.ollama.generateStatus = 404;

    const response = await request(testApp.app).post("/api/qa").send({ question: "hello" });

    expect(response.status).toBe(502);
    expect(response.body.code).toBe("QA_GENERATION_FAILED");
  });

  it("rejects an empty question", async () => {
    const response = await request(testApp.app).post("/api/qa").send({ question: "   " });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: "Question must not be empty", code: "QA_INVALID_PARAMETER" });
  });

  it("rejects out-of-range retrieval options", async () => {
    const response = await request(testApp.app).post("/api/qa").send({ question: "hello", topK: 0 });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_FAILED");
  });

  it("returns 404 when cancelling an unknown answer", async () => {
    const response = await request(testApp.app).post("/api/qa/operations/missing/cancel").send({});

    expect(response.status).toBe(404);
    expect(response.body.code).toBe("OPERATION_NOT_FOUND");
  });
});

describe("qa api without indexed documents", () => {
  let testApp: TestApp;

  beforeEach(() => {
    testApp = createTestApp();
  });

  afterEach(async () => {
    await testApp.context.dispose();
  });

  it("answers from general knowledge with no sources", async () => {
    const response = await request(testApp.app).post("/api/qa").send({ question: "What is the capital of France?" });

    expect(response.status).toBe(200);
    expect(response.body.result).toMatchObject({
      query: "What is the capital of France?",
      answer: "The answer is 42.",
      mode: "ungrounded",
      sources: [],
      confidence: 0
    });
    await expect(testApp.context.collection.stats()).resolves.toMatchObject({ documentCount: 0, chunkCount: 0 });
  });
});
