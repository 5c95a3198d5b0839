import { FastifyReply, FastifyRequest } from 'fastify';

export async function listCountriesHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await request.server.db.countries.list());
}
