import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { DocumentStore } from '../documents/document.store';
import { DocumentStatus } from '../documents/document.types';
import { DocumentsService } from '../documents/documents.service';

export type UploadResponse = {
  doc_id: string;
  status: DocumentStatus;
  message: string;
};

@Injectable()
export class UploadService {
  private readonly logger = new Logger(UploadService.name);

  constructor(
    private readonly store: DocumentStore,
    private readonly documents: DocumentsService,
  ) {}

  /** Stores the file and leaves it in the `received` state. */
  receive(file: Express.Multer.File | undefined): UploadResponse {
    const doc = this.store.create(this.toNewDocument(file));
    this.logger.log(
      `[UPLOAD] doc=${doc.docId} name=${doc.originalName} type=${doc.mimeType} bytes=${doc.sizeBytes}`,
    );
    return { doc_id: doc.docId, status: doc.status, message: 'Document uploaded.' };
  }

  /** Stores the file and runs extraction before answering. */
  async receiveAndProcess(file: Express.Multer.File | undefined): Promise<UploadResponse> {
    const { doc_id } = this.receive(file);
    const doc = await this.documents.process(doc_id);
    return { doc_id, status: doc.status, message: 'Document processing started.' };
  }

  private toNewDocument(file: Express.Multer.File | undefined) {
    if (!file) throw new BadRequestException('No file uploaded.');

    const content = file.buffer;
    if (!content || file.size === 0 || content.length === 0) {
      throw new BadRequestException('Uploaded file is empty.');
    }

    return {
      originalName: file.originalname || 'document',
      mimeType: file.mimetype || 'application/octet-stream',
      sizeBytes: file.size,
      content,
    };
  }
}
