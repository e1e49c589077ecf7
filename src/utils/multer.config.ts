import { MulterOptions } from '@nestjs/platform-express/multer/interfaces/multer-options.interface';
import { memoryStorage } from 'multer';

export const createMulterOptions = (maxUploadBytes: number): MulterOptions => ({
  storage: memoryStorage(), // the document store writes the buffer itself
  limits: {
    fileSize: maxUploadBytes,
    files: 1,
  },
});
