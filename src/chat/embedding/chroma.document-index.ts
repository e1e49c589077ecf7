import { Logger } from '@nestjs/common';
import type { Document } from '@langchain/core/documents';
import { Chroma } from '@langchain/community/vectorstores/chroma';
import { DocumentIndex } from './document-index';

export class ChromaDocumentIndex extends DocumentIndex {
  private readonly logger = new Logger(ChromaDocumentIndex.name);

  constructor(private readonly vectorStore: Chroma) {
    super();
  }

  async replaceSources(sources: string[], chunks: Document[], ids: string[]) {
    for (const source of sources) {
      await this.vectorStore.delete({ filter: { source } });
    }
    if (chunks.length > 0) {
      await this.vectorStore.addDocuments(chunks, { ids });
    }
    this.logger.log(
      `${chunks.length} chunks from ${sources.length} documents indexed into ${this.vectorStore.collectionName}`,
    );
  }

  asRetriever(k: number) {
    return this.vectorStore.asRetriever(k);
  }
}
