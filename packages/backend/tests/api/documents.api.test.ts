import { readdir } from "node:fs/promises";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTempFolder, type TempFolder } from "../helpers/tempFolder.js";
import { createTestApp, type TestApp } from "../helpers/testApp.js";

describe("documents api", () => {
  let folder: TempFolder;
  let uploads: TempFolder;
  let testApp: TestApp;

  beforeEach(async () => {
    folder = await createTempFolder();
    uploads = await createTempFolder("uploads-");
    testApp = createTestApp({ config: { UPLOADS_DIR: uploads.path } });
  });

  afterEach(async () => {
    await testApp.context.dispose();
    await folder.cleanup();
    await uploads.cleanup();
  });

  it("adds a document by path and lists it", async () => {
    const filePath = await folder.write("billing.txt", "Alpha team owns the billing service.");

    const created = await request(testApp.app).post("/api/documents").send({ filePath });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ title: "billing", filePath, chunkCount: 1, fallbackChunkCount: 0 });

    const listed = await request(testApp.app).get("/api/documents");
    expect(listed.status).toBe(200);
    expect(listed.body.documents).toHaveLength(1);
    expect(listed.body.documents[0]).toMatchObject({
      documentId: created.body.documentId,
      filename: "billing.txt",
      chunkCount: 1
    });
  });

  it("rejects a path with an unsupported extension", async () => {
    const filePath = await folder.write("diagram.png", "not an image");

    const response = await request(testApp.app).post("/api/documents").send({ filePath });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("INGEST_UNSUPPORTED_FORMAT");
  });

  it("stores and indexes an uploaded file", async () => {
    const response = await request(testApp.app)
      .post("/api/documents/upload")
      .attach("file", Buffer.from("# Notes\n\nDeploy on Fridays."), {
        filename: "release notes.md",
        contentType: "text/markdown"
      });

    expect(response.status).toBe(201);
    expect(response.body.title).toBe("release_notes");
    expect(response.body.filePath.startsWith(uploads.path)).toBe(true);
    expect(response.body.filePath.endsWith("/release_notes.md")).toBe(true);
    expect(await readdir(uploads.path)).toHaveLength(1);
  });

  it("rejects uploads with a disallowed extension", async () => {
    const response = await request(testApp.app)
      .post("/api/documents/upload")
      .attach("file", Buffer.from("MZ"), { filename: "tool.exe", contentType: "application/octet-stream" });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({ error: 'Unsupported file extension ".exe".', code: "INGEST_FILE_REJECTED" });
  });

  it("requires a file", async () => {
    const response = await request(testApp.app).post("/api/documents/upload");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "No file uploaded" });
  });

  it("removes the stored upload when it has no text", async () => {
    const response = await request(testApp.app)
      .post("/api/documents/upload")
      .attach("file", Buffer.from("   \n"), { filename: "blank.txt", contentType: "text/plain" });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("INGEST_EMPTY_CONTENT");
    expect(await readdir(uploads.path)).toEqual([]);
  });

  it("replaces a document's content", async () => {
    const filePath = await folder.write("billing.txt", "Alpha team owns the billing service.");
    const created = await request(testApp.app).post("/api/documents").send({ filePath });
    const documentId: string = created.body.documentId;

    const updated = await request(testApp.app)
      .put(`/api/documents/${documentId}`)
      .send({ content: "Alpha team moved to payments." });

    expect(updated.status).toBe(200);
    expect(updated.body).toMatchObject({ documentId, title: "billing", filePath, chunkCount: 1 });
  });

  it("validates update bodies and unknown ids", async () => {
    const both = await request(testApp.app).put("/api/documents/doc-1").send({ filePath: "/kb/a.txt", content: "x" });
    expect(both.status).toBe(400);
    expect(both.body.code).toBe("VALIDATION_FAILED");

    const missing = await request(testApp.app).put("/api/documents/doc-1").send({ content: "new text" });
    expect(missing.status).toBe(404);
    expect(missing.body.code).toBe("INDEX_DOCUMENT_NOT_FOUND");
  });

  it("deletes a document once", async () => {
    const filePath = await folder.write("billing.txt", "Alpha team owns the billing service.");
    const created = await request(testApp.app).post("/api/documents").send({ filePath });
    const documentId: string = created.body.documentId;

    const deleted = await request(testApp.app).delete(`/api/documents/${documentId}`);
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ documentId, removedChunks: 1 });

    const again = await request(testApp.app).delete(`/api/documents/${documentId}`);
    expect(again.status).toBe(404);
  });
});
