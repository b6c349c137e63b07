import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DocumentRecord, NewDocument } from './document.types';

// Callers get their own record and their own copy of the uploaded bytes.
function cloneRecord(record: DocumentRecord): DocumentRecord {
  return { ...record, content: Buffer.from(record.content) };
}

/**
 * Process-scoped document map. Every method is synchronous, so each call
 * completes without interleaving with other requests on the event loop.
 * Records live until the process exits.
 */
@Injectable()
export class DocumentStore {
  private readonly records = new Map<string, DocumentRecord>();

  create(input: NewDocument): DocumentRecord {
    let docId = randomUUID();
    while (this.records.has(docId)) {
      docId = randomUUID();
    }

    const record: DocumentRecord = {
      ...input,
      content: Buffer.from(input.content),
      docId,
      status: 'received',
      extractedText: null,
      createdAt: new Date(),
    };
    this.records.set(docId, record);
    return cloneRecord(record);
  }

  get(docId: string): DocumentRecord | undefined {
    const record = this.records.get(docId);
    return record ? cloneRecord(record) : undefined;
  }

  /** Records in upload order. */
  list(): DocumentRecord[] {
    return Array.from(this.records.values(), cloneRecord);
  }

  markProcessed(docId: string, extractedText: string): DocumentRecord | undefined {
    const record = this.records.get(docId);
    if (!record) return undefined;

    record.status = 'processed';
    record.extractedText = extractedText;
    return cloneRecord(record);
  }
}
