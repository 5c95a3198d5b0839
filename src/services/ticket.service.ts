import { randomUUID } from 'crypto';
import path from 'path';
import type { AccessContext } from '../auth/auth.types';
import { hasCapability } from '../auth/permission.resolver';
import type { Repositories } from '../repositories/types';
import type { CreateTicketInput, TicketListQuery, UpdateTicketInput } from '../schemas/ticket.zod';
import type { TicketAttachment, TicketWithPeople } from '../types/ticket.types';
import { BadRequestError, ForbiddenError, NotFoundError } from '../utils/errors';
import type { UploadedFile } from '../utils/multipart';
import { assertEmployeeExists } from './employee.service';
import type { FileStorage } from './storage';

const TICKETS_MODULE = 'tickets';

function isTicketAdmin(context: AccessContext) {
  return hasCapability(context, TICKETS_MODULE, 'adminActions');
}

/* ----------------------------------
   Tickets
----------------------------------- */

export async function getTicketOrThrow(db: Repositories, id: number): Promise<TicketWithPeople> {
  const ticket = await db.tickets.findById(id);
  if (!ticket) throw new NotFoundError('Ticket not found');
  return ticket;
}

export function listTickets(db: Repositories, query: TicketListQuery) {
  return db.tickets.list(query);
}

export async function createTicket(db: Repositories, createdBy: number, data: CreateTicketInput) {
  await assertEmployeeExists(db, data.assignedTo, 'Assigned employee');
  return db.tickets.create({ ...data, createdBy });
}

/** Allowed for the creator, the assignee, or holders of `tickets` admin actions. */
export async function updateTicket(db: Repositories, context: AccessContext, id: number, data: UpdateTicketInput) {
  const ticket = await getTicketOrThrow(db, id);
  const callerId = context.employee.id;

  if (ticket.createdBy !== callerId && ticket.assignedTo !== callerId && !isTicketAdmin(context)) {
    throw new ForbiddenError('Only the creator, the assignee, or users with admin permissions can update this ticket');
  }

  await assertEmployeeExists(db, data.assignedTo, 'Assigned employee');

  const updated = await db.tickets.update(id, data);
  if (!updated) throw new NotFoundError('Ticket not found');
  return updated;
}

export async function deleteTicket(db: Repositories, context: AccessContext, id: number) {
  const ticket = await getTicketOrThrow(db, id);

  if (ticket.createdBy !== context.employee.id && !isTicketAdmin(context)) {
    throw new ForbiddenError('Only the ticket creator or users with admin permissions can delete it');
  }

  await db.tickets.delete(id);
}

/* ----------------------------------
   Messages
----------------------------------- */

export async function listTicketMessages(db: Repositories, ticketId: number) {
  await getTicketOrThrow(db, ticketId);
  return db.ticketMessages.listByTicket(ticketId);
}

export async function getTicketMessageOrThrow(db: Repositories, id: number) {
  const message = await db.ticketMessages.findById(id);
  if (!message) throw new NotFoundError('Message not found');
  return message;
}

export async function createTicketMessage(db: Repositories, ticketId: number, userId: number, messageTxt: string) {
  await getTicketOrThrow(db, ticketId);
  return db.ticketMessages.create({ ticketId, userId, messageTxt });
}

async function assertMessageAuthorOrAdmin(db: Repositories, context: AccessContext, id: number, action: string) {
  const message = await getTicketMessageOrThrow(db, id);
  if (message.userId !== context.employee.id && !isTicketAdmin(context)) {
    throw new ForbiddenError(`Not allowed to ${action} message`);
  }
  return message;
}

export async function updateTicketMessage(db: Repositories, context: AccessContext, id: number, messageTxt: string) {
  await assertMessageAuthorOrAdmin(db, context, id, 'edit');

  const message = await db.ticketMessages.update(id, messageTxt);
  if (!message) throw new NotFoundError('Message not found');
  return message;
}

export async function deleteTicketMessage(db: Repositories, context: AccessContext, id: number) {
  await assertMessageAuthorOrAdmin(db, context, id, 'delete');
  await db.ticketMessages.delete(id);
}

/* ----------------------------------
   Attachments
----------------------------------- */

export interface AttachmentMetadata {
  ticketMessageId?: number;
  fileName?: string;
  fileType?: string;
  filePath?: string;
}

export async function listTicketAttachments(db: Repositories, ticketId: number) {
  await getTicketOrThrow(db, ticketId);
  return db.ticketAttachments.listByTicket(ticketId);
}

export async function getTicketAttachmentOrThrow(db: Repositories, id: number): Promise<TicketAttachment> {
  const attachment = await db.ticketAttachments.findById(id);
  if (!attachment) throw new NotFoundError('Attachment not found');
  return attachment;
}

const STORAGE_PREFIX = 'tickets/';

// A metadata-only row must never alias a stored upload.
function pointsIntoStorage(filePath: string) {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, '/')).replace(/^\/+/, '');
  return normalized.startsWith(STORAGE_PREFIX);
}

/**
 * An uploaded file is stored under `tickets/<ticketId>/` and takes
 * precedence over the metadata fields; without one, the client-supplied
 * path is recorded as-is, unless it points into attachment storage.
 */
export async function createTicketAttachment(
  db: Repositories,
  storage: FileStorage,
  ticketId: number,
  metadata: AttachmentMetadata,
  file?: UploadedFile
) {
  await getTicketOrThrow(db, ticketId);

  if (metadata.ticketMessageId !== undefined) {
    const message = await getTicketMessageOrThrow(db, metadata.ticketMessageId);
    if (message.ticketId !== ticketId) {
      throw new BadRequestError('Message does not belong to this ticket');
    }
  }

  let fileName = metadata.fileName;
  let fileType = metadata.fileType ?? null;
  let filePath = metadata.filePath ?? null;

  if (!file && filePath && pointsIntoStorage(filePath)) {
    throw new BadRequestError('filePath cannot point into attachment storage');
  }

  if (file) {
    const key = `${STORAGE_PREFIX}${ticketId}/${randomUUID().replace(/-/g, '')}${path.extname(file.fileName)}`;
    filePath = await storage.save(key, file.content, file.mimeType);
    fileName = file.fileName;
    fileType = file.mimeType;
  }

  if (!fileName) {
    throw new BadRequestError('Either a file or a fileName is required');
  }

  return db.ticketAttachments.create({
    ticketId,
    ticketMessageId: metadata.ticketMessageId ?? null,
    fileName,
    fileType,
    filePath,
  });
}

// Client-supplied paths outside the ticket's own folder are metadata only.
function storedFileKey(attachment: TicketAttachment) {
  const key = attachment.filePath;
  if (!key || !key.startsWith(`${STORAGE_PREFIX}${attachment.ticketId}/`) || key.split('/').includes('..')) {
    return null;
  }
  return key;
}

/** Returns the stored bytes when the attachment has a file in storage, null otherwise. */
export async function readTicketAttachment(storage: FileStorage, attachment: TicketAttachment) {
  const key = storedFileKey(attachment);
  if (!key || !(await storage.exists(key))) {
    return null;
  }
  return storage.read(key);
}

export async function deleteTicketAttachment(
  db: Repositories,
  storage: FileStorage,
  context: AccessContext,
  id: number
) {
  const attachment = await getTicketAttachmentOrThrow(db, id);
  if (!isTicketAdmin(context)) {
    throw new ForbiddenError('Not allowed to delete attachment');
  }

  await db.ticketAttachments.delete(id);
  const key = storedFileKey(attachment);
  if (key) {
    await storage.remove(key);
  }
}
