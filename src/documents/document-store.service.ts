import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import type { SaveAcknowledgement, UploadedDocument } from '../types/chat';
import type { Env } from '../config/env.validation';
import { InvalidDocumentNameError } from './document-store.errors';

/**
 * Flat directory of uploaded source documents. Its non-emptiness is what
 * switches the chat router from direct generation to retrieval.
 *
 * Writes overwrite silently; there is no delete path.
 */
@Injectable()
export class DocumentStoreService implements OnModuleInit {
  private readonly logger = new Logger(DocumentStoreService.name);
  readonly directory: string;

  constructor(configService: ConfigService<Env, true>) {
    this.directory = path.resolve(
      configService.get('DOCUMENT_STORE_DIR', { infer: true }),
    );
  }

  async onModuleInit() {
    await fs.promises.mkdir(this.directory, { recursive: true });
    this.logger.log(`Document store at ${this.directory}`);
  }

  async save(document: UploadedDocument): Promise<SaveAcknowledgement> {
    const filePath = this.resolve(document.filename);
    await fs.promises.writeFile(filePath, document.bytes);
    this.logger.log(
      `Saved ${document.filename} (${document.bytes.length} bytes)`,
    );
    return {
      filename: document.filename,
      path: filePath,
      size: document.bytes.length,
      message: `Saved file: ${document.filename} to directory`,
    };
  }

  async list(): Promise<string[]> {
    return fs.promises.readdir(this.directory);
  }

  async isEmpty(): Promise<boolean> {
    return (await this.list()).length === 0;
  }

  async read(filename: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolve(filename));
  }

  private resolve(filename: string) {
    if (
      filename.length === 0 ||
      filename === '.' ||
      filename === '..' ||
      filename !== path.basename(filename) ||
      filename.includes('\\') ||
      filename.includes('\0')
    ) {
      throw new InvalidDocumentNameError(filename);
    }
    return path.join(this.directory, filename);
  }
}
