import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DocumentAnalyzer } from '../analysis/document-analyzer';
import { DocumentStore } from './document.store';
import {
  AnalysisResult,
  DocumentDetail,
  DocumentRecord,
  DocumentSummary,
} from './document.types';

@Injectable()
export class DocumentsService {
  private readonly logger = new Logger(DocumentsService.name);

  constructor(
    private readonly store: DocumentStore,
    private readonly analyzer: DocumentAnalyzer,
  ) {}

  list(): DocumentSummary[] {
    return this.store.list().map((doc) => ({ doc_id: doc.docId, status: doc.status }));
  }

  getDetail(docId: string): DocumentDetail {
    const doc = this.store.get(docId);
    if (!doc) throw new NotFoundException('Document not found.');

    return {
      doc_id: doc.docId,
      status: doc.status,
      extracted_text: doc.extractedText,
    };
  }

  async process(docId: string): Promise<DocumentRecord> {
    const doc = this.store.get(docId);
    if (!doc) throw new NotFoundException('Document not found.');

    const text = await this.analyzer.extractText(doc);
    const processed = this.store.markProcessed(docId, text);
    if (!processed) throw new NotFoundException('Document not found.');

    this.logger.log(`[PROCESS] doc=${docId} chars=${text.length}`);
    return processed;
  }

  async analyze(fileId: string): Promise<AnalysisResult> {
    const doc = this.store.get(fileId);
    if (!doc) throw new NotFoundException('File not found.');

    this.logger.log(`[ANALYZE] doc=${fileId} status=${doc.status}`);
    return this.analyzer.analyze(doc);
  }
}
