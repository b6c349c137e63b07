import { Controller, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { UploadService } from './upload.service';
import { makeFileFilter } from './upload.validation';

const fileInterceptor = () => FileInterceptor('file', { fileFilter: makeFileFilter() });

@Controller()
export class UploadController {
  constructor(private readonly uploadService: UploadService) {}

  @Post('upload')
  @UseInterceptors(fileInterceptor())
  upload(@UploadedFile() file: Express.Multer.File | undefined) {
    return this.uploadService.receive(file);
  }

  @Post('process-document')
  @UseInterceptors(fileInterceptor())
  processDocument(@UploadedFile() file: Express.Multer.File | undefined) {
    return this.uploadService.receiveAndProcess(file);
  }
}
