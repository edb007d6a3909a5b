import { EventEmitter } from "node:events";
import { readdir, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type {
  IndexedDocumentSummary,
  IndexingOutcome,
  IndexStatus,
  KnowledgeDocument,
  ProgressInfo,
  SkippedFile
} from "@ragdesk/shared";
import {
  DocumentNotFoundError,
  EmptyContentError,
  KnowledgeBaseError,
  describeError,
  isCancelledError
} from "../errors.js";
import { replaceDocumentContent, type DocumentReader } from "../parsers/DocumentReader.js";
import { hasSupportedExtension } from "../parsers/formats.js";
import { DEFAULT_CANCEL_REASON } from "../runtime/cancellation.js";
import { ProgressTracker, shouldShowProgress } from "../runtime/progress.js";
import type { SettingsStoreLike } from "../services/SettingsStore.js";
import type { ClearResult, InsertResult, VectorCollectionManager } from "../store/VectorCollectionManager.js";
import { logger } from "../utils/logger.js";
import type {
  DocumentMutationResult,
  DocumentOperationOptions,
  DocumentUpdateSource,
  IndexFoldersOptions,
  IndexingPipelineOptions,
  IndexingStatusEvent
} from "./types.js";

const defaultOptions: IndexingPipelineOptions = {
  progressMinIntervalMs: 100,
  progressThresholdSeconds: 3,
  now: () => Date.now()
};

/** Failures that skip one file during a folder rebuild instead of ending it. */
export function isSkippableIngestionError(error: unknown): error is KnowledgeBaseError {
  return (
    error instanceof KnowledgeBaseError && (error.code.startsWith("INGEST_") || error.code === "INDEX_CHUNK_SPLIT")
  );
}

/** Lists supported files under each folder, depth first, in sorted order. */
export async function collectFiles(folders: string[], supportedExtensions: readonly string[]): Promise<string[]> {
  const files: string[] = [];

  const walk = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const entryPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (entry.isFile() && hasSupportedExtension(entryPath, supportedExtensions)) {
        files.push(entryPath);
      }
    }
  };

  for (const folder of folders) {
    const directory = resolve(folder);
    const info = await stat(directory).catch(() => null);
    if (!info?.isDirectory()) {
      logger.warn({ folder: directory }, "Folder does not exist or is not a directory, skipping");
      continue;
    }
    await walk(directory);
  }

  return [...new Set(files)];
}

/**
 * Write-side coordinator: reads files, hands them to the collection manager
 * and keeps the persisted index status in step with the outcome.
 */
export class IndexingPipeline {
  private readonly eventEmitter: EventEmitter;
  private readonly options: IndexingPipelineOptions;
  private lastOutcomeValue: IndexingOutcome | null = null;

  constructor(
    private readonly reader: DocumentReader,
    private readonly collection: VectorCollectionManager,
    private readonly settings: SettingsStoreLike,
    eventEmitter?: EventEmitter,
    options: Partial<IndexingPipelineOptions> = {}
  ) {
    this.eventEmitter = eventEmitter ?? new EventEmitter();
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  get lastOutcome(): IndexingOutcome | null {
    return this.lastOutcomeValue;
  }

  onStatus(listener: (event: IndexingStatusEvent) => void): () => void {
    this.eventEmitter.on("status", listener);
    return () => {
      this.eventEmitter.off("status", listener);
    };
  }

  /**
   * Rebuilds the collection from `folders`. Never throws: cancellation and
   * failure are reported through the returned outcome.
   */
  async indexFolders(folders: string[], options: IndexFoldersOptions = {}): Promise<IndexingOutcome> {
    const startedAt = this.options.now();
    const skipped: SkippedFile[] = [];
    let documentCount = 0;
    let chunkCount = 0;
    let tracker: ProgressTracker | null = null;
    let cleared = false;
    const previousStatus = this.settings.get().indexStatus;

    logger.info({ folders }, "Rebuilding index");

    try {
      this.settings.setIndexStatus("creating");
      options.token?.throwIfCancelled();
      await this.collection.clear();
      cleared = true;

      const files = await collectFiles(folders, this.settings.get().supportedExtensions);
      // Runs expected to outlast the threshold also report progress in the log.
      const report = (info: ProgressInfo): void => {
        options.onProgress?.(info);
        const estimatedSeconds = info.elapsedSeconds + (info.estimatedRemainingSeconds ?? 0);
        if (shouldShowProgress(estimatedSeconds, this.options.progressThresholdSeconds)) {
          logger.info({ current: info.current, total: info.total, percentage: info.percentage }, info.message);
        }
      };
      tracker = new ProgressTracker(files.length, report, {
        minIntervalMs: this.options.progressMinIntervalMs,
        now: this.options.now
      });

      for (const [index, filePath] of files.entries()) {
        options.token?.throwIfCancelled();
        const position = `${index + 1}/${files.length}`;

        try {
          const inserted = await this.ingest(filePath, options);
          documentCount += 1;
          chunkCount += inserted.chunkCount;
          tracker.update(1, `Indexed ${basename(filePath)} (${position})`);
        } catch (error) {
          if (!isSkippableIngestionError(error)) {
            throw error;
          }
          skipped.push({ filePath, code: error.code, message: error.message });
          this.emitStatus({ filePath, phase: "skipped", message: error.message });
          logger.warn({ filePath, code: error.code }, "Skipping file");
          tracker.update(1, `Skipped ${basename(filePath)} (${position})`);
        }
      }

      tracker.finish("Index rebuilt");
      this.settings.setIndexStatus("created");
      const outcome: IndexingOutcome = {
        status: "completed",
        documentCount,
        chunkCount,
        skipped,
        elapsedMs: this.options.now() - startedAt
      };
      logger.info({ documentCount, chunkCount, skipped: skipped.length }, "Index rebuilt");
      return this.remember(outcome);
    } catch (error) {
      const elapsedMs = this.options.now() - startedAt;

      if (isCancelledError(error)) {
        tracker?.cancel("Cancelled");
        // Nothing was removed yet when cancelled before the clear.
        this.persistStatus(cleared ? (documentCount > 0 ? "created" : "not_created") : previousStatus);
        logger.info({ documentCount, chunkCount }, "Index rebuild cancelled");
        return this.remember({
          status: "cancelled",
          documentCount,
          chunkCount,
          reason: options.token?.reason ?? DEFAULT_CANCEL_REASON,
          elapsedMs
        });
      }

      const described = describeError(error);
      tracker?.cancel(`Failed: ${described.message}`);
      this.persistStatus("error");
      logger.error({ err: error, documentCount }, "Index rebuild failed");
      return this.remember({
        status: "failed",
        documentCount,
        chunkCount,
        error: described,
        elapsedMs
      });
    }
  }

  async addDocument(filePath: string, options: DocumentOperationOptions = {}): Promise<DocumentMutationResult> {
    try {
      const document = await this.readFile(filePath);
      const inserted = await this.insert(document, options);
      this.settings.setIndexStatus("created");
      return toMutationResult(document, inserted);
    } catch (error) {
      this.emitStatus({ filePath, phase: "error", message: describeError(error).message });
      throw error;
    }
  }

  async updateDocument(
    documentId: string,
    source: DocumentUpdateSource,
    options: DocumentOperationOptions = {}
  ): Promise<DocumentMutationResult> {
    const document =
      "filePath" in source
        ? await this.readFile(source.filePath, documentId)
        : await this.documentWithContent(documentId, source.content);

    this.emitStatus({ filePath: document.filePath, documentId, phase: "embedding" });
    const updated = await this.collection.update(documentId, document, options);
    this.emitStatus({ filePath: document.filePath, documentId, phase: "indexed" });
    logger.info({ documentId, chunkCount: updated.chunkCount }, "Updated document");
    return toMutationResult(document, updated);
  }

  async deleteDocument(documentId: string): Promise<number> {
    const removed = await this.collection.delete(documentId);
    this.emitStatus({ documentId, phase: "deleted" });
    logger.info({ documentId, removed }, "Deleted document");
    return removed;
  }

  listDocuments(): Promise<IndexedDocumentSummary[]> {
    return this.collection.listDocuments();
  }

  async clearIndex(): Promise<ClearResult> {
    const result = await this.collection.clear();
    this.settings.setIndexStatus("not_created");
    logger.info(result, "Cleared index");
    return result;
  }

  private async ingest(filePath: string, options: DocumentOperationOptions): Promise<InsertResult> {
    const document = await this.readFile(filePath);
    return this.insert(document, options);
  }

  private async readFile(filePath: string, id?: string): Promise<KnowledgeDocument> {
    this.emitStatus({ filePath, documentId: id, phase: "reading" });
    return this.reader.readDocument(filePath, { id });
  }

  private async insert(document: KnowledgeDocument, options: DocumentOperationOptions): Promise<InsertResult> {
    this.emitStatus({ filePath: document.filePath, documentId: document.id, phase: "embedding" });
    const inserted = await this.collection.insert(document, options);
    this.emitStatus({
      filePath: document.filePath,
      documentId: document.id,
      phase: "indexed",
      message: `${inserted.chunkCount} chunks`
    });
    return inserted;
  }

  private async documentWithContent(documentId: string, content: string): Promise<KnowledgeDocument> {
    const documents = await this.collection.listDocuments();
    const existing = documents.find((document) => document.documentId === documentId);
    if (!existing) {
      throw new DocumentNotFoundError(documentId);
    }

    const text = content.trim();
    if (!text) {
      throw new EmptyContentError(existing.filePath);
    }
    const createdAt = new Date(existing.createdAt);
    const current: KnowledgeDocument = {
      id: documentId,
      title: existing.title,
      content: "",
      filePath: existing.filePath,
      fileType: existing.fileType,
      fileSize: 0,
      createdAt,
      updatedAt: createdAt
    };
    return replaceDocumentContent(current, text);
  }

  private persistStatus(status: IndexStatus): void {
    try {
      this.settings.setIndexStatus(status);
    } catch (error) {
      logger.error({ err: error, status }, "Failed to persist index status");
    }
  }

  private remember(outcome: IndexingOutcome): IndexingOutcome {
    this.lastOutcomeValue = outcome;
    return outcome;
  }

  private emitStatus(event: IndexingStatusEvent): void {
    this.eventEmitter.emit("status", event);
  }
}

function toMutationResult(document: KnowledgeDocument, inserted: InsertResult): DocumentMutationResult {
  return {
    documentId: document.id,
    title: document.title,
    filePath: document.filePath,
    chunkCount: inserted.chunkCount,
    fallbackChunkCount: inserted.fallbackChunkCount
  };
}
