import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { DocumentsController } from './documents.controller';
import { DocumentStoreService } from './document-store.service';
import { createMulterOptions } from '../utils/multer.config';
import type { Env } from '../config/env.validation';

@Module({
  imports: [
    MulterModule.registerAsync({
      useFactory: (configService: ConfigService<Env, true>) =>
        createMulterOptions(
          configService.get('MAX_UPLOAD_BYTES', { infer: true }),
        ),
      inject: [ConfigService],
    }),
  ],
  controllers: [DocumentsController],
  providers: [DocumentStoreService],
  exports: [DocumentStoreService],
})
export class DocumentsModule {}
