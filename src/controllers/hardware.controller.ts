import { FastifyReply, FastifyRequest } from 'fastify';
import { IdParamsSchema } from '../schemas/common.zod';
import { CreateHardwareSchema, UpdateHardwareSchema } from '../schemas/inventory.zod';
import {
  createHardware,
  deleteHardware,
  getHardwareOrThrow,
  listHardware,
  updateHardware,
} from '../services/hardware.service';

export async function listHardwareHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listHardware(request.server.db));
}

export async function getHardwareHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getHardwareOrThrow(request.server.db, id));
}

export async function createHardwareHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateHardwareSchema.parse(request.body);
  return reply.status(201).send(await createHardware(request.server.db, data));
}

export async function updateHardwareHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateHardwareSchema.parse(request.body);
  return reply.send(await updateHardware(request.server.db, id, data));
}

export async function deleteHardwareHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteHardware(request.server.db, id);
  return reply.send({ success: true, message: 'Hardware deleted successfully' });
}
