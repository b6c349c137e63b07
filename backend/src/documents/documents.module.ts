import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { AnalyzeController } from './analyze.controller';
import { DocumentStore } from './document.store';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';

@Module({
  imports: [AnalysisModule],
  controllers: [DocumentsController, AnalyzeController],
  providers: [DocumentStore, DocumentsService],
  exports: [DocumentStore, DocumentsService],
})
export class DocumentsModule {}
