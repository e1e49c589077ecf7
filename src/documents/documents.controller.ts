import {
  BadRequestException,
  Controller,
  Get,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { DocumentStoreService } from './document-store.service';
import { InvalidDocumentNameError } from './document-store.errors';

@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(private readonly documentStore: DocumentStoreService) {}

  @Post()
  @UseInterceptors(FileInterceptor('file'))
  async upload(@UploadedFile() file: Express.Multer.File | undefined) {
    if (!file) {
      throw new BadRequestException('Must upload a file');
    }
    // multer hands over multipart file names decoded as latin1
    const filename = Buffer.from(file.originalname, 'latin1').toString('utf8');
    // uploads are PDFs by client convention only
    if (file.mimetype !== 'application/pdf') {
      this.logger.warn(`${filename} uploaded as ${file.mimetype}, storing as is`);
    }
    try {
      return await this.documentStore.save({
        filename,
        bytes: file.buffer,
        mimeType: file.mimetype,
      });
    } catch (error) {
      if (error instanceof InvalidDocumentNameError) {
        throw new BadRequestException(error.message);
      }
      throw error;
    }
  }

  @Get()
  async findAll() {
    return { documents: await this.documentStore.list() };
  }
}
