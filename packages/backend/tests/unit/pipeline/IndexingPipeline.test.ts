import type { KnowledgeBaseSettings, ProgressInfo } from "@ragdesk/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DocumentNotFoundError, EmptyContentError, UnsupportedFormatError } from "../../../src/errors.js";
import { DocumentReader } from "../../../src/parsers/DocumentReader.js";
import { Chunker } from "../../../src/pipeline/Chunker.js";
import { collectFiles, IndexingPipeline, isSkippableIngestionError } from "../../../src/pipeline/IndexingPipeline.js";
import type { IndexingStatusEvent } from "../../../src/pipeline/types.js";
import { CancellationToken } from "../../../src/runtime/cancellation.js";
import { EmbeddingProvider } from "../../../src/services/EmbeddingProvider.js";
import { InMemorySettingsStore } from "../../../src/services/InMemorySettingsStore.js";
import { InMemoryVectorStore } from "../../../src/store/InMemoryVectorStore.js";
import { VectorCollectionManager } from "../../../src/store/VectorCollectionManager.js";
import { FakeEmbeddingClient } from "../../helpers/fakeEmbeddings.js";
import { testSettings } from "../../helpers/settings.js";
import { createTempFolder, type TempFolder } from "../../helpers/tempFolder.js";

class ReadOnlySettingsStore extends InMemorySettingsStore {
  override setIndexStatus(): KnowledgeBaseSettings {
    throw Object.assign(new Error("EROFS: read-only file system"), { code: "EROFS" });
  }
}

function createPipeline(
  options: { fallbackEnabled?: boolean; client?: FakeEmbeddingClient; settings?: InMemorySettingsStore } = {}
) {
  const client = options.client ?? new FakeEmbeddingClient();
  const embeddings = new EmbeddingProvider(
    { model: "nomic-embed-text", baseURL: "http://localhost:11434", fallbackEnabled: options.fallbackEnabled },
    { client }
  );
  const collection = new VectorCollectionManager(new InMemoryVectorStore(), embeddings, new Chunker(), {
    collectionName: "pipeline_test"
  });
  const settings = options.settings ?? new InMemorySettingsStore(testSettings());
  const pipeline = new IndexingPipeline(new DocumentReader(), collection, settings, undefined, {
    progressMinIntervalMs: 0
  });
  return { pipeline, collection, settings, client };
}

describe("IndexingPipeline", () => {
  let folder: TempFolder;

  beforeEach(async () => {
    folder = await createTempFolder();
    await folder.write("a.txt", "Alpha team owns the billing service.");
    await folder.write("b.md", "# Beta\n\nBeta team owns search.");
    await folder.write("empty.txt", "   \n");
    await folder.write("ignore.png", "not an image");
    await folder.write("nested/c.txt", "Gamma team owns the mobile app.");
  });

  afterEach(async () => {
    await folder.cleanup();
  });

  it("collects supported files depth first in sorted order", async () => {
    const files = await collectFiles([folder.path, `${folder.path}/does-not-exist`], [".txt", ".md"]);

    expect(files.map((file) => file.slice(folder.path.length + 1))).toEqual([
      "a.txt",
      "b.md",
      "empty.txt",
      "nested/c.txt"
    ]);
  });

  it("rebuilds the index and skips unreadable files", async () => {
    const { pipeline, collection, settings } = createPipeline();
    const progress: ProgressInfo[] = [];

    const outcome = await pipeline.indexFolders([folder.path], { onProgress: (info) => progress.push(info) });

    expect(outcome).toMatchObject({
      status: "completed",
      documentCount: 3,
      chunkCount: 3,
      skipped: [{ filePath: `${folder.path}/empty.txt`, code: "INGEST_EMPTY_CONTENT" }]
    });
    expect(settings.get().indexStatus).toBe("created");
    expect(pipeline.lastOutcome).toBe(outcome);
    expect(progress.map((info) => info.message)).toEqual([
      "Indexed a.txt (1/4)",
      "Indexed b.md (2/4)",
      "Skipped empty.txt (3/4)",
      "Indexed c.txt (4/4)",
      "Index rebuilt"
    ]);
    const documents = await collection.listDocuments();
    expect(documents.map((document) => document.filename)).toEqual(["a.txt", "b.md", "c.txt"]);
  });

  it("replaces the previous contents on every rebuild", async () => {
    const { pipeline, collection } = createPipeline();
    await pipeline.indexFolders([folder.path]);
    const other = await createTempFolder();
    await other.write("only.txt", "The only document left.");

    try {
      const outcome = await pipeline.indexFolders([other.path]);

      expect(outcome).toMatchObject({ status: "completed", documentCount: 1 });
      await expect(collection.stats()).resolves.toMatchObject({ documentCount: 1, chunkCount: 1 });
    } finally {
      await other.cleanup();
    }
  });

  it("stops after the current document when cancelled", async () => {
    const { pipeline, collection, settings } = createPipeline();
    const token = new CancellationToken("index-run");
    pipeline.onStatus((event) => {
      if (event.phase === "indexed") {
        token.cancel("user pressed stop");
      }
    });

    const outcome = await pipeline.indexFolders([folder.path], { token });

    expect(outcome).toMatchObject({ status: "cancelled", documentCount: 1, reason: "user pressed stop" });
    await expect(collection.listDocuments()).resolves.toHaveLength(1);
    expect(settings.get().indexStatus).toBe("created");
  });

  it("keeps the previous status when cancelled before starting", async () => {
    const { pipeline, settings } = createPipeline();
    const token = new CancellationToken("index-run");
    token.cancel();

    const outcome = await pipeline.indexFolders([folder.path], { token });

    expect(outcome).toMatchObject({ status: "cancelled", documentCount: 0, reason: "user cancelled" });
    expect(settings.get().indexStatus).toBe("not_created");
  });

  it("leaves an existing index in place when a rebuild is cancelled before starting", async () => {
    const { pipeline, settings } = createPipeline();
    await pipeline.indexFolders([folder.path]);
    const token = new CancellationToken("index-run");
    token.cancel();

    const outcome = await pipeline.indexFolders([folder.path], { token });

    expect(outcome).toMatchObject({ status: "cancelled", documentCount: 0 });
    expect(settings.get().indexStatus).toBe("created");
    await expect(pipeline.listDocuments()).resolves.toHaveLength(3);
  });

  it("reports a failed rebuild when the index status cannot be saved", async () => {
    const { pipeline } = createPipeline({ settings: new ReadOnlySettingsStore(testSettings()) });

    const outcome = await pipeline.indexFolders([folder.path]);

    expect(outcome).toMatchObject({
      status: "failed",
      documentCount: 0,
      error: { code: "UNEXPECTED", message: "EROFS: read-only file system" }
    });
    expect(pipeline.lastOutcome).toEqual(outcome);
  });

  it("reports a failed rebuild without throwing", async () => {
    const client = new FakeEmbeddingClient();
    client.failure = new Error("connect ECONNREFUSED");
    const { pipeline, settings } = createPipeline({ client, fallbackEnabled: false });

    const outcome = await pipeline.indexFolders([folder.path]);

    expect(outcome).toMatchObject({
      status: "failed",
      documentCount: 0,
      error: { code: "INDEX_EMBEDDING_UNAVAILABLE" }
    });
    expect(settings.get().indexStatus).toBe("error");
  });

  it("adds, updates and deletes single documents", async () => {
    const { pipeline, collection, settings } = createPipeline();
    const events: IndexingStatusEvent[] = [];
    pipeline.onStatus((event) => events.push(event));

    const added = await pipeline.addDocument(`${folder.path}/a.txt`);
    expect(added).toMatchObject({ title: "a", filePath: `${folder.path}/a.txt`, chunkCount: 1, fallbackChunkCount: 0 });
    expect(settings.get().indexStatus).toBe("created");

    const updated = await pipeline.updateDocument(added.documentId, { content: "  Alpha team moved to payments.  " });
    expect(updated).toMatchObject({ documentId: added.documentId, title: "a", chunkCount: 1 });
    const matches = await collection.search("payments", 1);
    expect(matches[0]?.content).toBe("Alpha team moved to payments.");

    const reread = await pipeline.updateDocument(added.documentId, { filePath: `${folder.path}/nested/c.txt` });
    expect(reread).toMatchObject({ documentId: added.documentId, title: "c" });

    await expect(pipeline.deleteDocument(added.documentId)).resolves.toBe(1);
    expect(events.map((event) => event.phase)).toEqual([
      "reading",
      "embedding",
      "indexed",
      "embedding",
      "indexed",
      "reading",
      "embedding",
      "indexed",
      "deleted"
    ]);
  });

  it("rejects updates of unknown or emptied documents", async () => {
    const { pipeline } = createPipeline();
    const added = await pipeline.addDocument(`${folder.path}/a.txt`);

    await expect(pipeline.updateDocument("missing", { content: "text" })).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(pipeline.updateDocument(added.documentId, { content: " \n " })).rejects.toBeInstanceOf(
      EmptyContentError
    );
  });

  it("reports a rejected file through the status stream", async () => {
    const { pipeline } = createPipeline();
    const events: IndexingStatusEvent[] = [];
    pipeline.onStatus((event) => events.push(event));

    await expect(pipeline.addDocument(`${folder.path}/ignore.png`)).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(events.at(-1)).toMatchObject({ phase: "error", filePath: `${folder.path}/ignore.png` });
  });

  it("clears the index and resets the status", async () => {
    const { pipeline, settings } = createPipeline();
    await pipeline.indexFolders([folder.path]);

    await expect(pipeline.clearIndex()).resolves.toEqual({ strategy: "bulk-delete", removed: 3 });
    expect(settings.get().indexStatus).toBe("not_created");
  });
});

describe("isSkippableIngestionError", () => {
  it("skips ingestion failures only", () => {
    expect(isSkippableIngestionError(new EmptyContentError("/a.txt"))).toBe(true);
    expect(isSkippableIngestionError(new DocumentNotFoundError("x"))).toBe(false);
    expect(isSkippableIngestionError(new Error("plain"))).toBe(false);
  });
});
