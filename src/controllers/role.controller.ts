import { FastifyReply, FastifyRequest } from 'fastify';
import { CreateRoleSchema, UpdateRoleSchema } from '../schemas/access.zod';
import { IdParamsSchema } from '../schemas/common.zod';
import { createRole, deleteRole, getRoleOrThrow, listRoles, updateRole } from '../services/role.service';

export async function listRolesHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listRoles(request.server.db));
}

export async function getRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getRoleOrThrow(request.server.db, id));
}

export async function createRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateRoleSchema.parse(request.body);
  return reply.status(201).send(await createRole(request.server.db, data));
}

export async function updateRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateRoleSchema.parse(request.body);
  return reply.send(await updateRole(request.server.db, id, data));
}

export async function deleteRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteRole(request.server.db, id);
  return reply.send({ success: true, message: 'Role deleted successfully' });
}
