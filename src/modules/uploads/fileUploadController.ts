// src/modules/uploads/fileUploadController.ts
import { Readable } from 'stream';
import { z } from 'zod';
import { defineController, ControllerBuilder } from '../../core/controllerRegistry';
import { params } from '../../core/params';
import { t } from '../../core/valueTypes';
import { badRequest, created, file, streamFile } from '../../entities/actionResult';
import { FormFile } from '../../entities/formFile';
import { FileValidationOptions } from '../../security/fileValidator';

export const SAMPLE_FILE_NAME = 'sample.txt';
export const SAMPLE_FILE_LINES = [
  'This file is generated by the upload controller.',
  'It exists so clients can test downloads without uploading first.',
];

export const uploadValidation: FileValidationOptions = {
  maxFileSizeBytes: 5 * 1024 * 1024,
  allowedExtensions: ['.txt', '.csv', '.json', '.pdf', '.png', '.jpg', '.jpeg', '.gif'],
  rejectExecutables: true,
  checkSignatures: true,
};

const metadataSchema = z.object({
  category: z.string().min(1).default('general'),
  priority: z.number().int().min(1).max(5).default(3),
  public: z.boolean().default(false),
});

function describeUpload(upload: FormFile) {
  return {
    fieldName: upload.name,
    fileName: upload.fileName,
    contentType: upload.contentType,
    size: upload.length,
    extension: upload.extension,
  };
}

function sampleBytes(): Buffer {
  return Buffer.from(SAMPLE_FILE_LINES.join('\n') + '\n', 'utf8');
}

export function createFileUploadController(): ControllerBuilder {
  return defineController({ name: 'FileUploadController', route: 'api/upload' })
    .post(
      '',
      params().file('file', t.formFile(), { validate: uploadValidation }).context(),
      (upload, ctx) => {
        if (!upload) return badRequest({ error: "No file was sent in the 'file' field" });
        ctx.logger.info('File received', { fileName: upload.fileName, size: upload.length });
        return created({ message: 'File uploaded', file: describeUpload(upload) });
      },
      { allowAnonymous: true },
    )

    // form fields are bound individually and as a model
    .post(
      'with-metadata',
      params()
        .file('file', t.formFile(), { validate: uploadValidation })
        .form('description', t.string(), { default: '' })
        .form('metadata', t.shape(metadataSchema, 'upload metadata')),
      (upload, description, metadata) => {
        if (!upload) return badRequest({ error: "No file was sent in the 'file' field" });
        return created({
          message: 'File uploaded with metadata',
          file: describeUpload(upload),
          description,
          metadata: metadata ?? metadataSchema.parse({}),
        });
      },
      { allowAnonymous: true },
    )

    .get('sample', params(), () => file(sampleBytes(), 'text/plain; charset=utf-8', SAMPLE_FILE_NAME), {
      allowAnonymous: true,
    })

    .get(
      'sample/stream',
      params(),
      () =>
        streamFile(Readable.from(SAMPLE_FILE_LINES.map((line) => `${line}\n`)), 'text/plain; charset=utf-8', {
          fileName: SAMPLE_FILE_NAME,
          inline: true,
        }),
      { allowAnonymous: true },
    );
}
