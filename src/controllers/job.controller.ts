import { FastifyReply, FastifyRequest } from 'fastify';
import { IdParamsSchema } from '../schemas/common.zod';
import { CreateJobSchema, StatusParamsSchema, UpdateJobSchema } from '../schemas/recruiting.zod';
import {
  createJob,
  deleteJob,
  getJobOrThrow,
  listJobs,
  listJobsByStatus,
  updateJob,
} from '../services/job.service';

export async function listJobsHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listJobs(request.server.db));
}

export async function listJobsByStatusHandler(request: FastifyRequest, reply: FastifyReply) {
  const { status } = StatusParamsSchema.parse(request.params);
  return reply.send(await listJobsByStatus(request.server.db, status));
}

export async function getJobHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getJobOrThrow(request.server.db, id));
}

export async function createJobHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateJobSchema.parse(request.body);
  return reply.status(201).send(await createJob(request.server.db, data));
}

export async function updateJobHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateJobSchema.parse(request.body);
  return reply.send(await updateJob(request.server.db, id, data));
}

export async function deleteJobHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteJob(request.server.db, id);
  return reply.send({ success: true, message: 'Job deleted successfully' });
}
