import { FastifyReply, FastifyRequest } from 'fastify';
import { IdParamsSchema } from '../schemas/common.zod';
import { CreateLicenseSchema, UpdateLicenseSchema } from '../schemas/inventory.zod';
import {
  createLicense,
  deleteLicense,
  getLicenseOrThrow,
  listLicenses,
  updateLicense,
} from '../services/license.service';

export async function listLicensesHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listLicenses(request.server.db));
}

export async function getLicenseHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getLicenseOrThrow(request.server.db, id));
}

export async function createLicenseHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateLicenseSchema.parse(request.body);
  return reply.status(201).send(await createLicense(request.server.db, data));
}

export async function updateLicenseHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateLicenseSchema.parse(request.body);
  return reply.send(await updateLicense(request.server.db, id, data));
}

export async function deleteLicenseHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteLicense(request.server.db, id);
  return reply.send({ success: true, message: 'License deleted successfully' });
}
