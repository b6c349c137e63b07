import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { AnalysisResult, DocumentRecord } from '../documents/document.types';
import { DocumentAnalyzer } from './document-analyzer';

export const PLACEHOLDER_TEXT = 'Sample extracted text from the document.';

export const PLACEHOLDER_ANALYSIS: Readonly<AnalysisResult> = Object.freeze({
  summary: 'This is a summary of the document.',
  pros: ['Clear terms and conditions', 'Well-defined responsibilities'],
  cons: ['Complex language', 'Ambiguous timelines'],
  loopholes: ['No penalty for non-compliance'],
});

/** Returns fixed content for every document; nothing is read or sent anywhere. */
@Injectable()
export class PlaceholderAnalyzer extends DocumentAnalyzer implements OnModuleInit {
  private readonly logger = new Logger(PlaceholderAnalyzer.name);

  constructor(private readonly config: ConfigService<EnvironmentVariables, true>) {
    super();
  }

  onModuleInit() {
    const model = this.config.get('MODEL_ID', { infer: true });
    const processor = this.config.get('PROCESSOR_ID', { infer: true }) || '(unset)';
    const location = this.config.get('LOCATION', { infer: true });
    this.logger.log(
      `Placeholder analyzer active: model ${model} and processor ${processor} in ${location} are not called`,
    );
  }

  async extractText(_record: DocumentRecord): Promise<string> {
    return PLACEHOLDER_TEXT;
  }

  async analyze(_record: DocumentRecord): Promise<AnalysisResult> {
    return {
      summary: PLACEHOLDER_ANALYSIS.summary,
      pros: [...PLACEHOLDER_ANALYSIS.pros],
      cons: [...PLACEHOLDER_ANALYSIS.cons],
      loopholes: [...PLACEHOLDER_ANALYSIS.loopholes],
    };
  }
}
