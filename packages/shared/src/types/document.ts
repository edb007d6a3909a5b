export type DocumentFileType = "pdf" | "text" | "markdown" | "rich-text";

export type EmbeddingSource = "remote" | "fallback";

export interface KnowledgeDocument {
  id: string;
  title: string;
  content: string;
  filePath: string;
  fileType: DocumentFileType;
  fileSize: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentChunk {
  id: string;
  documentId: string;
  index: number;
  content: string;
}

export interface ChunkMetadata {
  documentId: string;
  chunkIndex: number;
  title: string;
  filename: string;
  filePath: string;
  fileType: DocumentFileType;
  fileSize: number;
  createdAt: string;
  embeddingSource: EmbeddingSource;
}

export interface IndexedDocumentSummary {
  documentId: string;
  title: string;
  filename: string;
  filePath: string;
  fileType: DocumentFileType;
  chunkCount: number;
  fallbackChunkCount: number;
  createdAt: string;
}
