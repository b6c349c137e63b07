import { INestApplication, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

const PDF = { filename: 'contract.pdf', contentType: 'application/pdf' };
const DOCX = {
  filename: 'lease.docx',
  contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

describe('Legal document analyzer API (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication();
    configureApp(app, app.get(Logger));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  const server = () => app.getHttpServer();

  const upload = (path: '/upload' | '/process-document', file = PDF) =>
    request(server()).post(path).attach('file', Buffer.from('%PDF-1.4 test body'), file);

  it('GET / greets', async () => {
    const res = await request(server()).get('/').expect(200);

    expect(res.body).toEqual({ message: 'Welcome to the Legal Document Analyzer API' });
  });

  it('GET /health reports healthy', async () => {
    const res = await request(server()).get('/health').expect(200);

    expect(res.body).toEqual({ status: 'healthy' });
  });

  describe('POST /upload', () => {
    it('stores the file as received', async () => {
      const res = await upload('/upload').expect(201);

      expect(res.body).toEqual({
        doc_id: expect.any(String),
        status: 'received',
        message: 'Document uploaded.',
      });

      const detail = await request(server()).get(`/documents/${res.body.doc_id}`).expect(200);
      expect(detail.body).toEqual({
        doc_id: res.body.doc_id,
        status: 'received',
        extracted_text: null,
      });
    });

    it('returns a different id for every upload', async () => {
      const first = await upload('/upload').expect(201);
      const second = await upload('/upload', DOCX).expect(201);

      expect(first.body.doc_id).not.toBe(second.body.doc_id);
    });

    it('rejects a request without a file', async () => {
      const res = await request(server()).post('/upload').expect(400);

      expect(res.body).toEqual({ error: { code: 'Bad Request', message: 'No file uploaded.' } });
    });

    it('rejects unsupported file types', async () => {
      const res = await request(server())
        .post('/upload')
        .attach('file', Buffer.from('not a contract'), {
          filename: 'photo.png',
          contentType: 'image/png',
        })
        .expect(400);

      expect(res.body.error.message).toBe('Unsupported file type.');
    });

    it('rejects an empty file', async () => {
      const res = await request(server())
        .post('/upload')
        .attach('file', Buffer.alloc(0), PDF)
        .expect(400);

      expect(res.body.error.message).toBe('Uploaded file is empty.');
    });
  });

  describe('POST /process-document', () => {
    it('stores the file and fills in the extracted text', async () => {
      const res = await upload('/process-document', DOCX).expect(201);

      expect(res.body).toEqual({
        doc_id: expect.any(String),
        status: 'processed',
        message: 'Document processing started.',
      });

      const detail = await request(server()).get(`/documents/${res.body.doc_id}`).expect(200);
      expect(detail.body).toEqual({
        doc_id: res.body.doc_id,
        status: 'processed',
        extracted_text: 'Sample extracted text from the document.',
      });
    });
  });

  describe('GET /documents', () => {
    it('is empty before any upload', async () => {
      const res = await request(server()).get('/documents').expect(200);

      expect(res.body).toEqual([]);
    });

    it('lists every upload with its status in upload order', async () => {
      const received = await upload('/upload');
      const processed = await upload('/process-document');

      const res = await request(server()).get('/documents').expect(200);

      expect(res.body).toEqual([
        { doc_id: received.body.doc_id, status: 'received' },
        { doc_id: processed.body.doc_id, status: 'processed' },
      ]);
    });

    it('answers 404 for an unknown id', async () => {
      const res = await request(server()).get('/documents/does-not-exist').expect(404);

      expect(res.body).toEqual({ error: { code: 'Not Found', message: 'Document not found.' } });
    });
  });

  describe('POST /analyze', () => {
    it('returns the placeholder analysis for a stored document', async () => {
      const uploaded = await upload('/upload');

      const res = await request(server())
        .post('/analyze')
        .send({ file_id: uploaded.body.doc_id })
        .expect(200);

      expect(res.body).toEqual({
        summary: 'This is a summary of the document.',
        pros: ['Clear terms and conditions', 'Well-defined responsibilities'],
        cons: ['Complex language', 'Ambiguous timelines'],
        loopholes: ['No penalty for non-compliance'],
      });
    });

    it('ignores unknown body properties', async () => {
      const uploaded = await upload('/upload');

      await request(server())
        .post('/analyze')
        .send({ file_id: uploaded.body.doc_id, extra: true })
        .expect(200);
    });

    it('answers 404 for an unknown id', async () => {
      const res = await request(server())
        .post('/analyze')
        .send({ file_id: 'file123' })
        .expect(404);

      expect(res.body).toEqual({ error: { code: 'Not Found', message: 'File not found.' } });
    });

    it('looks up long ids instead of rejecting them', async () => {
      const res = await request(server())
        .post('/analyze')
        .send({ file_id: 'x'.repeat(500) })
        .expect(404);

      expect(res.body.error.message).toBe('File not found.');
    });

    it('rejects a body without file_id', async () => {
      const res = await request(server()).post('/analyze').send({}).expect(400);

      expect(res.body.error.code).toBe('Bad Request');
      expect(res.body.error.message).toBe('Validation failed');
      expect(res.body.error.details).toEqual(
        expect.arrayContaining(['file_id should not be empty', 'file_id must be a string']),
      );
    });
  });
});
