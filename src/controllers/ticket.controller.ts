import { FastifyReply, FastifyRequest } from 'fastify';
import { getAccessContext, getCurrentEmployee } from '../auth/current-employee';
import { IdParamsSchema } from '../schemas/common.zod';
import {
  AttachmentFieldsSchema,
  CreateMessageSchema,
  CreateTicketSchema,
  ListTicketsQuerySchema,
  TicketIdParamsSchema,
  UpdateMessageSchema,
  UpdateTicketSchema,
} from '../schemas/ticket.zod';
import {
  createTicket,
  createTicketAttachment,
  createTicketMessage,
  deleteTicket,
  deleteTicketAttachment,
  deleteTicketMessage,
  getTicketAttachmentOrThrow,
  getTicketMessageOrThrow,
  getTicketOrThrow,
  listTicketAttachments,
  listTicketMessages,
  listTickets,
  readTicketAttachment,
  updateTicket,
  updateTicketMessage,
} from '../services/ticket.service';
import { attachmentDisposition } from '../utils/download';
import { readMultipart } from '../utils/multipart';

/* ----------------------------------
   Tickets
----------------------------------- */

export async function listTicketsHandler(request: FastifyRequest, reply: FastifyReply) {
  const query = ListTicketsQuerySchema.parse(request.query);
  return reply.send(await listTickets(request.server.db, query));
}

export async function getTicketHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getTicketOrThrow(request.server.db, id));
}

export async function createTicketHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateTicketSchema.parse(request.body);
  const employee = await getCurrentEmployee(request);

  const ticket = await createTicket(request.server.db, employee.id, data);
  return reply.status(201).send(ticket);
}

export async function updateTicketHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateTicketSchema.parse(request.body);
  const context = await getAccessContext(request);

  return reply.send(await updateTicket(request.server.db, context, id, data));
}

export async function deleteTicketHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const context = await getAccessContext(request);

  await deleteTicket(request.server.db, context, id);
  return reply.send({ success: true, message: 'Ticket deleted successfully' });
}

/* ----------------------------------
   Messages
----------------------------------- */

export async function listTicketMessagesHandler(request: FastifyRequest, reply: FastifyReply) {
  const { ticketId } = TicketIdParamsSchema.parse(request.params);
  return reply.send(await listTicketMessages(request.server.db, ticketId));
}

export async function createTicketMessageHandler(request: FastifyRequest, reply: FastifyReply) {
  const { ticketId } = TicketIdParamsSchema.parse(request.params);
  const { messageTxt } = CreateMessageSchema.parse(request.body);
  const employee = await getCurrentEmployee(request);

  const message = await createTicketMessage(request.server.db, ticketId, employee.id, messageTxt);
  return reply.status(201).send(message);
}

export async function getTicketMessageHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getTicketMessageOrThrow(request.server.db, id));
}

export async function updateTicketMessageHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const { messageTxt } = UpdateMessageSchema.parse(request.body);
  const context = await getAccessContext(request);

  return reply.send(await updateTicketMessage(request.server.db, context, id, messageTxt));
}

export async function deleteTicketMessageHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const context = await getAccessContext(request);

  await deleteTicketMessage(request.server.db, context, id);
  return reply.send({ success: true, message: 'Message deleted successfully' });
}

/* ----------------------------------
   Attachments
----------------------------------- */

export async function listTicketAttachmentsHandler(request: FastifyRequest, reply: FastifyReply) {
  const { ticketId } = TicketIdParamsSchema.parse(request.params);
  return reply.send(await listTicketAttachments(request.server.db, ticketId));
}

/**
 * POST /tickets/:ticketId/attachments
 * Accepts a multipart body (optional `file` part plus metadata fields)
 * or a JSON body with metadata only.
 */
export async function createTicketAttachmentHandler(request: FastifyRequest, reply: FastifyReply) {
  const { ticketId } = TicketIdParamsSchema.parse(request.params);

  if (request.isMultipart()) {
    const { fields, files } = await readMultipart(request);
    const metadata = AttachmentFieldsSchema.parse(fields);
    const attachment = await createTicketAttachment(
      request.server.db,
      request.server.storage,
      ticketId,
      metadata,
      files[0]
    );
    return reply.status(201).send(attachment);
  }

  const metadata = AttachmentFieldsSchema.parse(request.body ?? {});
  const attachment = await createTicketAttachment(request.server.db, request.server.storage, ticketId, metadata);
  return reply.status(201).send(attachment);
}

export async function getTicketAttachmentHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const attachment = await getTicketAttachmentOrThrow(request.server.db, id);

  const content = await readTicketAttachment(request.server.storage, attachment);
  if (!content) {
    return reply.send(attachment);
  }

  return reply
    .header('Content-Type', attachment.fileType || 'application/octet-stream')
    .header('Content-Disposition', attachmentDisposition(attachment.fileName))
    .send(content);
}

export async function deleteTicketAttachmentHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const context = await getAccessContext(request);

  await deleteTicketAttachment(request.server.db, request.server.storage, context, id);
  return reply.send({ success: true, message: 'Attachment deleted successfully' });
}
