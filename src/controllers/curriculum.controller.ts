import { FastifyReply, FastifyRequest } from 'fastify';
import { IdParamsSchema } from '../schemas/common.zod';
import {
  CreateCurriculumSchema,
  CurriculumUploadFieldsSchema,
  JobIdParamsSchema,
  StatusParamsSchema,
  UpdateCurriculumSchema,
} from '../schemas/recruiting.zod';
import {
  createCurriculum,
  createCurriculumFromUpload,
  deleteCurriculum,
  downloadCurriculum,
  getCurriculumOrThrow,
  listCurriculums,
  listCurriculumsByJob,
  listCurriculumsByStatus,
  updateCurriculum,
} from '../services/curriculum.service';
import { attachmentDisposition } from '../utils/download';
import { BadRequestError } from '../utils/errors';
import { readMultipart } from '../utils/multipart';

const RESUME_FIELD = 'resumeFile';

export async function createCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateCurriculumSchema.parse(request.body);
  return reply.status(201).send(await createCurriculum(request.server.db, data));
}

/**
 * POST /curriculums/upload
 * multipart/form-data: applicant fields plus the `resumeFile` part.
 */
export async function uploadCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const { fields, files } = await readMultipart(request);

  const resume = files.find((file) => file.fieldName === RESUME_FIELD);
  if (!resume) {
    throw new BadRequestError(`Missing file field "${RESUME_FIELD}"`);
  }

  const data = CurriculumUploadFieldsSchema.parse(fields);
  const curriculum = await createCurriculumFromUpload(request.server.db, request.server.storage, data, resume);
  return reply.status(201).send(curriculum);
}

export async function listCurriculumsHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listCurriculums(request.server.db));
}

export async function listCurriculumsByJobHandler(request: FastifyRequest, reply: FastifyReply) {
  const { jobId } = JobIdParamsSchema.parse(request.params);
  return reply.send(await listCurriculumsByJob(request.server.db, jobId));
}

export async function listCurriculumsByStatusHandler(request: FastifyRequest, reply: FastifyReply) {
  const { status } = StatusParamsSchema.parse(request.params);
  return reply.send(await listCurriculumsByStatus(request.server.db, status));
}

export async function getCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getCurriculumOrThrow(request.server.db, id));
}

export async function updateCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateCurriculumSchema.parse(request.body);
  return reply.send(await updateCurriculum(request.server.db, id, data));
}

export async function downloadCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const file = await downloadCurriculum(request.server.db, request.server.storage, id);

  return reply
    .header('Content-Type', file.contentType)
    .header('Content-Disposition', attachmentDisposition(file.fileName))
    .send(file.content);
}

export async function deleteCurriculumHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteCurriculum(request.server.db, request.server.storage, id);
  return reply.send({ success: true, message: 'Curriculum deleted successfully' });
}
