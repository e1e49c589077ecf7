import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import * as mime from 'mime-types';
import { Document } from '@langchain/core/documents';
import { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { PromptTemplate } from '@langchain/core/prompts';
import { RunnableSequence } from '@langchain/core/runnables';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { JSONLoader } from 'langchain/document_loaders/fs/json';
import { TextLoader } from 'langchain/document_loaders/fs/text';
import { RecursiveCharacterTextSplitter } from 'langchain/text_splitter';
import { formatDocumentsAsString } from 'langchain/util/document';
import type { Env } from '../config/env.validation';
import { DocumentIndex } from './embedding/document-index';
import { SYSTEM_TEMPLATE } from '../utils/models';
import { sha256 } from '../utils/hash';

/**
 * Answers a query from the documents in a corpus directory.
 *
 * Every call reloads the whole corpus, re-splits it and re-indexes it before
 * retrieving; nothing is cached between calls. Chunk ids are content
 * addressed and each file's earlier chunks are replaced, so the collection
 * holds one copy of the current corpus.
 */
@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);
  private readonly splitter: RecursiveCharacterTextSplitter;
  private readonly topK: number;

  constructor(
    configService: ConfigService<Env, true>,
    private readonly chatModel: BaseChatModel,
    private readonly documentIndex: DocumentIndex,
  ) {
    this.splitter = new RecursiveCharacterTextSplitter({
      chunkSize: configService.get('CHUNK_SIZE', { infer: true }),
      chunkOverlap: configService.get('CHUNK_OVERLAP', { infer: true }),
    });
    this.topK = configService.get('RETRIEVAL_TOP_K', { infer: true });
  }

  async *queryStream(prompt: string, corpusDir: string): AsyncGenerator<string> {
    const filenames = await fs.promises.readdir(corpusDir);
    const chunks: Document[] = [];
    const ids: string[] = [];
    for (const filename of filenames) {
      const bytes = await fs.promises.readFile(path.join(corpusDir, filename));
      const fileChunks = await this.splitter.splitDocuments(
        await this.loadDocuments(filename, bytes),
      );
      fileChunks.forEach((chunk, index) => {
        chunks.push(chunk);
        ids.push(sha256(`${filename}:${index}:${chunk.pageContent}`));
      });
    }
    await this.documentIndex.replaceSources(filenames, chunks, ids);

    const relevantDocs = await this.documentIndex
      .asRetriever(this.topK)
      .invoke(prompt);
    this.logger.log(
      `${relevantDocs.length} of ${chunks.length} chunks retrieved for query`,
    );

    const chain = RunnableSequence.from([
      {
        question: (input: { question: string }) => input.question,
        context: () => formatDocumentsAsString(relevantDocs),
      },
      PromptTemplate.fromTemplate(SYSTEM_TEMPLATE),
      this.chatModel,
      new StringOutputParser(),
    ]);

    const response = await chain.stream({ question: prompt });
    for await (const fragment of response) {
      if (fragment) yield fragment;
    }
  }

  loadDocuments = async (filename: string, bytes: Buffer) => {
    const fileType = mime.lookup(filename) || 'text/plain';
    const blob = new Blob([bytes], { type: fileType });
    const loader =
      fileType === 'application/pdf'
        ? new PDFLoader(blob)
        : fileType === 'application/json'
          ? new JSONLoader(blob)
          : new TextLoader(blob);
    const loaded = await loader.load();

    // vector store metadata must stay flat
    return loaded.map((doc) => {
      const loc: unknown = doc.metadata.loc;
      const page =
        typeof loc === 'object' &&
        loc !== null &&
        'pageNumber' in loc &&
        typeof loc.pageNumber === 'number'
          ? loc.pageNumber
          : undefined;
      return new Document({
        pageContent: doc.pageContent,
        metadata: page === undefined ? { source: filename } : { source: filename, page },
      });
    });
  };
}
