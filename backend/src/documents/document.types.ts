export type DocumentStatus = 'received' | 'processed';

export type DocumentRecord = {
  docId: string;
  status: DocumentStatus;
  originalName: string;
  mimeType: string;
  sizeBytes: number;
  content: Buffer;
  extractedText: string | null;
  createdAt: Date;
};

export type NewDocument = Pick<DocumentRecord, 'originalName' | 'mimeType' | 'sizeBytes' | 'content'>;

// Wire shapes keep the snake_case keys clients already use.
export type DocumentSummary = {
  doc_id: string;
  status: DocumentStatus;
};

export type DocumentDetail = DocumentSummary & {
  extracted_text: string | null;
};

export type AnalysisResult = {
  summary: string;
  pros: string[];
  cons: string[];
  loopholes: string[];
};
