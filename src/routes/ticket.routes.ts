import { FastifyInstance } from 'fastify';
import {
  createTicketAttachmentHandler,
  createTicketHandler,
  createTicketMessageHandler,
  deleteTicketAttachmentHandler,
  deleteTicketHandler,
  deleteTicketMessageHandler,
  getTicketAttachmentHandler,
  getTicketHandler,
  getTicketMessageHandler,
  listTicketAttachmentsHandler,
  listTicketMessagesHandler,
  listTicketsHandler,
  updateTicketHandler,
  updateTicketMessageHandler,
} from '../controllers/ticket.controller';
import { authGuard } from '../hooks/auth.guard';

export async function ticketRoutes(app: FastifyInstance) {
  app.get('/tickets', { preHandler: [authGuard] }, listTicketsHandler);
  app.get('/tickets/:id', { preHandler: [authGuard] }, getTicketHandler);
  app.post('/tickets', { preHandler: [authGuard] }, createTicketHandler);
  app.patch('/tickets/:id', { preHandler: [authGuard] }, updateTicketHandler);
  app.delete('/tickets/:id', { preHandler: [authGuard] }, deleteTicketHandler);

  app.get('/tickets/:ticketId/messages', { preHandler: [authGuard] }, listTicketMessagesHandler);
  app.post('/tickets/:ticketId/messages', { preHandler: [authGuard] }, createTicketMessageHandler);
  app.get('/messages/:id', { preHandler: [authGuard] }, getTicketMessageHandler);
  app.patch('/messages/:id', { preHandler: [authGuard] }, updateTicketMessageHandler);
  app.delete('/messages/:id', { preHandler: [authGuard] }, deleteTicketMessageHandler);

  app.get('/tickets/:ticketId/attachments', { preHandler: [authGuard] }, listTicketAttachmentsHandler);
  app.post('/tickets/:ticketId/attachments', { preHandler: [authGuard] }, createTicketAttachmentHandler);
  app.get('/attachments/:id', { preHandler: [authGuard] }, getTicketAttachmentHandler);
  app.delete('/attachments/:id', { preHandler: [authGuard] }, deleteTicketAttachmentHandler);
}
