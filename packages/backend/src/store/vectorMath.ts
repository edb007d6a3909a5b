import type { ChunkMetadata, IndexedDocumentSummary, StoredChunkRecord, VectorQueryMatch } from "@ragdesk/shared";

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Cosine distance: 0 for identical direction, 2 for opposite. */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - cosineSimilarity(a, b);
}

export function rankByDistance(
  records: Iterable<StoredChunkRecord>,
  embedding: readonly number[],
  topK: number
): VectorQueryMatch[] {
  const matches: VectorQueryMatch[] = [];
  for (const record of records) {
    matches.push({
      id: record.id,
      content: record.content,
      metadata: record.metadata,
      distance: cosineDistance(record.embedding, embedding)
    });
  }

  return matches
    .sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id))
    .slice(0, Math.max(0, topK));
}

export function summarizeDocuments(metadataList: Iterable<ChunkMetadata>): IndexedDocumentSummary[] {
  const summaries = new Map<string, IndexedDocumentSummary>();

  for (const metadata of metadataList) {
    const existing = summaries.get(metadata.documentId);
    if (existing) {
      existing.chunkCount += 1;
      existing.fallbackChunkCount += metadata.embeddingSource === "fallback" ? 1 : 0;
      continue;
    }

    summaries.set(metadata.documentId, {
      documentId: metadata.documentId,
      title: metadata.title,
      filename: metadata.filename,
      filePath: metadata.filePath,
      fileType: metadata.fileType,
      chunkCount: 1,
      fallbackChunkCount: metadata.embeddingSource === "fallback" ? 1 : 0,
      createdAt: metadata.createdAt
    });
  }

  return [...summaries.values()].sort(
    (a, b) => a.filename.localeCompare(b.filename) || a.documentId.localeCompare(b.documentId)
  );
}
