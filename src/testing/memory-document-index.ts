import type { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { FakeEmbeddings } from '@langchain/core/utils/testing';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { DocumentIndex } from '../chat/embedding/document-index';

/** In-process stand-in for the Chroma collection. */
export class MemoryDocumentIndex extends DocumentIndex {
  readonly chunks = new Map<string, Document>();
  rebuilds = 0;
  private vectorStore: MemoryVectorStore;

  constructor(private readonly embeddings: EmbeddingsInterface = new FakeEmbeddings()) {
    super();
    this.vectorStore = new MemoryVectorStore(embeddings);
  }

  async replaceSources(sources: string[], chunks: Document[], ids: string[]) {
    for (const [id, chunk] of this.chunks) {
      if (sources.includes(chunk.metadata.source)) this.chunks.delete(id);
    }
    chunks.forEach((chunk, index) => this.chunks.set(ids[index], chunk));

    this.vectorStore = new MemoryVectorStore(this.embeddings);
    await this.vectorStore.addDocuments([...this.chunks.values()]);
    this.rebuilds += 1;
  }

  asRetriever(k: number) {
    return this.vectorStore.asRetriever(k);
  }
}
