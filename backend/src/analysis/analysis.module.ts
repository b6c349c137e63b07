import { Module } from '@nestjs/common';
import { DocumentAnalyzer } from './document-analyzer';
import { PlaceholderAnalyzer } from './placeholder-analyzer';

@Module({
  providers: [{ provide: DocumentAnalyzer, useClass: PlaceholderAnalyzer }],
  exports: [DocumentAnalyzer],
})
export class AnalysisModule {}
