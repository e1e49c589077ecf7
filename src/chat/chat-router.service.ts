import { Injectable, Logger } from '@nestjs/common';
import { DocumentStoreService } from '../documents/document-store.service';
import type { RouteMode } from '../types/chat';
import { GenerationService } from './generation.service';
import { RetrievalService } from './retrieval.service';

/**
 * Sends a prompt to direct generation while the document store is empty and
 * to retrieval over the stored documents once it holds anything. The store is
 * checked on every call; nothing is cached between prompts.
 */
@Injectable()
export class ChatRouterService {
  private readonly logger = new Logger(ChatRouterService.name);

  constructor(
    private readonly documentStore: DocumentStoreService,
    private readonly generationService: GenerationService,
    private readonly retrievalService: RetrievalService,
  ) {}

  async resolveMode(): Promise<RouteMode> {
    if (await this.documentStore.isEmpty()) {
      return { kind: 'direct' };
    }
    return { kind: 'retrieval', corpusDir: this.documentStore.directory };
  }

  /** Resolves the mode when iteration starts, then streams that service's answer. */
  async *route(prompt: string): AsyncGenerator<string, RouteMode> {
    const mode = await this.resolveMode();
    this.logger.log(`Routing prompt to ${mode.kind} mode`);
    switch (mode.kind) {
      case 'direct':
        yield* this.generationService.completeStream(prompt);
        break;
      case 'retrieval':
        yield* this.retrievalService.queryStream(prompt, mode.corpusDir);
        break;
    }
    return mode;
  }
}
