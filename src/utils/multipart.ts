import { FastifyRequest } from 'fastify';
import { BadRequestError } from './errors';

export interface UploadedFile {
  fieldName: string;
  fileName: string;
  mimeType: string;
  content: Buffer;
}

export interface MultipartBody {
  fields: Record<string, string>;
  files: UploadedFile[];
}

/** Buffers every part of a multipart/form-data request. */
export async function readMultipart(request: FastifyRequest): Promise<MultipartBody> {
  if (!request.isMultipart()) {
    throw new BadRequestError('Expected a multipart/form-data request');
  }

  const fields: Record<string, string> = {};
  const files: UploadedFile[] = [];

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      files.push({
        fieldName: part.fieldname,
        fileName: part.filename,
        mimeType: part.mimetype,
        content: await part.toBuffer(),
      });
    } else {
      fields[part.fieldname] = typeof part.value === 'string' ? part.value : String(part.value);
    }
  }

  return { fields, files };
}
