import { z } from 'zod';
import { TICKET_PRIORITIES, TICKET_SLAS, TICKET_STATUSES } from '../types/ticket.types';

export const CreateTicketSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200),
  description: z.string().max(2000).nullable().optional(),
  status: z.enum(TICKET_STATUSES).default('todo'),
  priority: z.enum(TICKET_PRIORITIES).default('normal'),
  sla: z.enum(TICKET_SLAS).nullable().optional(),
  assignedTo: z.number().int().positive().nullable().optional(),
});

export const UpdateTicketSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(2000).nullable().optional(),
  status: z.enum(TICKET_STATUSES).optional(),
  priority: z.enum(TICKET_PRIORITIES).optional(),
  // An empty string clears the SLA.
  sla: z.preprocess((v) => (v === '' ? null : v), z.enum(TICKET_SLAS).nullable().optional()),
  assignedTo: z.number().int().positive().nullable().optional(),
});

export const ListTicketsQuerySchema = z.object({
  status: z.enum(TICKET_STATUSES).optional(),
  priority: z.enum(TICKET_PRIORITIES).optional(),
  sla: z.enum(TICKET_SLAS).optional(),
  assignedTo: z.coerce.number().int().positive().optional(),
  createdBy: z.coerce.number().int().positive().optional(),
  search: z.string().trim().min(1).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const TicketIdParamsSchema = z.object({ ticketId: z.coerce.number().int().positive() });

export const CreateMessageSchema = z.object({
  messageTxt: z.string().trim().min(1, 'Message cannot be empty').max(4000),
});

export const UpdateMessageSchema = CreateMessageSchema;

/** Metadata fields sent alongside (or instead of) an uploaded file. */
export const AttachmentFieldsSchema = z.object({
  ticketMessageId: z.coerce.number().int().positive().optional(),
  fileName: z.string().trim().min(1).max(255).optional(),
  fileType: z.string().trim().max(100).optional(),
  filePath: z.string().trim().max(500).optional(),
});

export type CreateTicketInput = z.infer<typeof CreateTicketSchema>;
export type UpdateTicketInput = z.infer<typeof UpdateTicketSchema>;
export type TicketListQuery = z.infer<typeof ListTicketsQuerySchema>;
