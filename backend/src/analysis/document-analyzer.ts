import { AnalysisResult, DocumentRecord } from '../documents/document.types';

/**
 * Injection token and contract for whatever turns an uploaded document into
 * text and an analysis. Swap the provider bound in AnalysisModule to replace
 * the placeholder.
 */
export abstract class DocumentAnalyzer {
  abstract extractText(record: DocumentRecord): Promise<string>;

  abstract analyze(record: DocumentRecord): Promise<AnalysisResult>;
}
