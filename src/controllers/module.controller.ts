import { FastifyReply, FastifyRequest } from 'fastify';
import {
  CreateModuleSchema,
  ListModulesQuerySchema,
  ModuleKeyParamsSchema,
  UpdateModuleSchema,
} from '../schemas/access.zod';
import { IdParamsSchema } from '../schemas/common.zod';
import { ModuleService } from '../services/module.service';

export async function createModuleHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateModuleSchema.parse(request.body);
  return reply.status(201).send(await ModuleService.createModule(request.server.db, data));
}

export async function listModulesHandler(request: FastifyRequest, reply: FastifyReply) {
  const { includeInactive } = ListModulesQuerySchema.parse(request.query);
  return reply.send(await ModuleService.list(request.server.db, includeInactive));
}

export async function getModuleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await ModuleService.getById(request.server.db, id));
}

export async function getModuleByKeyHandler(request: FastifyRequest, reply: FastifyReply) {
  const { key } = ModuleKeyParamsSchema.parse(request.params);
  return reply.send(await ModuleService.getByKey(request.server.db, key));
}

export async function listModuleChildrenHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await ModuleService.listChildren(request.server.db, id));
}

export async function listRootModulesHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await ModuleService.listRoots(request.server.db));
}

export async function updateModuleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateModuleSchema.parse(request.body);
  return reply.send(await ModuleService.updateModule(request.server.db, id, data));
}

export async function deleteModuleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await ModuleService.deleteModule(request.server.db, id);
  return reply.send({ success: true, message: 'Module deleted successfully' });
}

export async function toggleModuleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await ModuleService.toggleActive(request.server.db, id));
}
