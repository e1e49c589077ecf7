import type { Document } from '@langchain/core/documents';
import type { BaseRetrieverInterface } from '@langchain/core/retrievers';

/**
 * Vector index behind the retrieval service. Chunks carry a `source`
 * metadata field naming the stored file they came from.
 */
export abstract class DocumentIndex {
  /**
   * Drops every chunk indexed for the given sources, then adds `chunks`
   * under `ids` (same length, same order).
   */
  abstract replaceSources(
    sources: string[],
    chunks: Document[],
    ids: string[],
  ): Promise<void>;

  abstract asRetriever(k: number): BaseRetrieverInterface;
}
