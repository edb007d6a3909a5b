import { join } from "node:path";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteVectorStore } from "../../src/store/SqliteVectorStore.js";
import { createTempFolder, type TempFolder } from "../helpers/tempFolder.js";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

describe("knowledge base on a SQLite collection", () => {
  let documents: TempFolder;
  let storage: TempFolder;
  const opened: TestApp[] = [];

  const open = (): TestApp => {
    const testApp = createTestApp({ backend: new SqliteVectorStore({ dbPath: join(storage.path, "vectors.db") }) });
    opened.push(testApp);
    return testApp;
  };

  beforeEach(async () => {
    documents = await createTempFolder();
    storage = await createTempFolder("storage-");
    await documents.write("billing.txt", "Alpha team owns the billing service.");
    await documents.write("runbooks/search.md", "# Search\n\nBeta team owns search.");
  });

  afterEach(async () => {
    for (const testApp of opened.splice(0)) {
      await testApp.context.dispose();
    }
    await documents.cleanup();
    await storage.cleanup();
  });

  it("keeps indexed documents across restarts", async () => {
    const first = open();
    const indexed = await request(first.app).post("/api/indexing").send({ folders: [documents.path] });
    expect(indexed.body.outcome).toMatchObject({ status: "completed", documentCount: 2 });
    await first.context.dispose();
    opened.splice(opened.indexOf(first), 1);

    const second = open();
    const listed = await request(second.app).get("/api/documents");
    expect(listed.body.documents.map((document: { filename: string }) => document.filename).sort()).toEqual([
      "billing.txt",
      "search.md"
    ]);

    const answered = await request(second.app)
      .post("/api/qa")
      .send({ question: "Alpha team owns the billing service", topK: 1 });
    expect(answered.status).toBe(200);
    expect(answered.body.result.mode).toBe("grounded");
    expect(answered.body.result.sources.map((source: { filename: string }) => source.filename)).toEqual([
      "billing.txt"
    ]);
  });

  it("removes a deleted document from later searches", async () => {
    const testApp = open();
    await testApp.context.pipeline.indexFolders([documents.path]);
    const [billing] = (await testApp.context.pipeline.listDocuments()).filter(
      (document) => document.filename === "billing.txt"
    );
    expect(billing).toBeDefined();

    await request(testApp.app).delete(`/api/documents/${billing?.documentId ?? ""}`);
    const response = await request(testApp.app)
      .get("/api/search")
      .query({ q: "Alpha team owns the billing service", minSimilarity: 0.9 });

    expect(response.body.results).toEqual([]);
  });
});
