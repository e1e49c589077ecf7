import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatOpenAI, OpenAIEmbeddings } from '@langchain/openai';
import { Chroma } from '@langchain/community/vectorstores/chroma';
import { DocumentsModule } from '../documents/documents.module';
import type { Env } from '../config/env.validation';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { ChatRouterService } from './chat-router.service';
import { GenerationService } from './generation.service';
import { RetrievalService } from './retrieval.service';
import { SessionStoreService } from './session/session-store.service';
import { DocumentIndex } from './embedding/document-index';
import { ChromaDocumentIndex } from './embedding/chroma.document-index';

const logger = new Logger('ChatModule');

// The local model server speaks the OpenAI API, so the OpenAI client is
// pointed at it instead of api.openai.com.
const chatModelProvider = {
  provide: BaseChatModel,
  useFactory: (configService: ConfigService<Env, true>) => {
    const baseURL = configService.get('GENERATION_BASE_URL', { infer: true });
    const model = configService.get('GENERATION_MODEL', { infer: true });
    const timeout = configService.get('GENERATION_TIMEOUT_MS', { infer: true });
    logger.log(`Language model ${model} at ${baseURL} (timeout ${timeout}ms)`);

    return new ChatOpenAI({
      configuration: {
        baseURL,
      },
      apiKey: configService.get('GENERATION_API_KEY', { infer: true }),
      model,
      timeout,
      maxRetries: 0,
    });
  },
  inject: [ConfigService],
};

const documentIndexProvider = {
  provide: DocumentIndex,
  useFactory: (configService: ConfigService<Env, true>) => {
    const embeddings = new OpenAIEmbeddings({
      configuration: {
        baseURL: configService.get('GENERATION_BASE_URL', { infer: true }),
      },
      apiKey: configService.get('GENERATION_API_KEY', { infer: true }),
      model: configService.get('EMBEDDING_MODEL', { infer: true }),
      maxRetries: 0,
    });
    const vectorStore = new Chroma(embeddings, {
      collectionName: configService.get('COLLECTION_NAME', { infer: true }),
      url: configService.get('CHROMADB_URL', { infer: true }),
    });

    return new ChromaDocumentIndex(vectorStore);
  },
  inject: [ConfigService],
};

@Module({
  imports: [DocumentsModule],
  controllers: [ChatController],
  providers: [
    ChatService,
    ChatRouterService,
    GenerationService,
    RetrievalService,
    SessionStoreService,
    chatModelProvider,
    documentIndexProvider,
  ],
})
export class ChatModule {}
