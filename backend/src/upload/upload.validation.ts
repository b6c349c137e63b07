import { BadRequestException } from '@nestjs/common';
import { extname } from 'path';

export const ALLOWED_MIME_TYPES = new Set<string>([
  'application/pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
]);

export const ALLOWED_EXTENSIONS = new Set<string>(['.pdf', '.docx', '.txt']);

type IncomingFile = Pick<Express.Multer.File, 'originalname' | 'mimetype'>;

type FileFilterCallback = (error: Error | null, acceptFile: boolean) => void;

export function isAllowedFile(
  file: IncomingFile,
  allowedMimeTypes: ReadonlySet<string> = ALLOWED_MIME_TYPES,
  allowedExtensions: ReadonlySet<string> = ALLOWED_EXTENSIONS,
): boolean {
  const ext = extname(file.originalname || '').toLowerCase();
  return allowedMimeTypes.has(file.mimetype) || allowedExtensions.has(ext);
}

// A file passes when either its MIME type or its extension is allowed.
export function makeFileFilter(
  allowedMimeTypes: ReadonlySet<string> = ALLOWED_MIME_TYPES,
  allowedExtensions: ReadonlySet<string> = ALLOWED_EXTENSIONS,
) {
  return (_req: unknown, file: IncomingFile, cb: FileFilterCallback) => {
    if (!isAllowedFile(file, allowedMimeTypes, allowedExtensions)) {
      return cb(new BadRequestException('Unsupported file type.'), false);
    }
    return cb(null, true);
  };
}
