import { beforeEach, describe, expect, it } from 'vitest';
import { createMemoryRepositories } from '../../__tests__/helpers/memory-repositories';
import { grant, MemoryFileStorage } from '../../__tests__/helpers/test-app';
import type { AccessContext } from '../../auth/auth.types';
import { resolveAccessContext } from '../../auth/permission.resolver';
import type { Repositories } from '../../repositories/types';
import type { Employee } from '../../types/employee.types';
import {
  createTicket,
  createTicketAttachment,
  createTicketMessage,
  deleteTicket,
  deleteTicketAttachment,
  readTicketAttachment,
  updateTicket,
  updateTicketMessage,
} from '../ticket.service';

describe('ticket service', () => {
  let db: Repositories;
  let storage: MemoryFileStorage;
  let creator: Employee;
  let assignee: Employee;
  let bystander: Employee;
  let admin: Employee;

  const contextOf = (employee: Employee): Promise<AccessContext> => resolveAccessContext(db, employee);

  beforeEach(async () => {
    db = createMemoryRepositories();
    storage = new MemoryFileStorage();
    creator = await db.employees.create({ azureOid: 'oid-creator', displayName: 'Creator' });
    assignee = await db.employees.create({ azureOid: 'oid-assignee', displayName: 'Assignee' });
    bystander = await db.employees.create({ azureOid: 'oid-bystander', displayName: 'Bystander' });
    admin = await db.employees.create({ azureOid: 'oid-admin', displayName: 'Admin' });
    await grant(db, admin.id, 'tickets', { canView: true, adminActions: true });
  });

  const openTicket = () =>
    createTicket(db, creator.id, { title: 'Laptop broken', status: 'todo', priority: 'high', assignedTo: assignee.id });

  it('fills creator and assignee summaries', async () => {
    const ticket = await openTicket();

    expect(ticket).toMatchObject({
      createdBy: creator.id,
      assignedTo: assignee.id,
      sla: null,
      creator: { id: creator.id, displayName: 'Creator', email: null, title: null },
      assignee: { id: assignee.id, displayName: 'Assignee', email: null, title: null },
    });
  });

  it('requires the assignee to exist', async () => {
    await expect(
      createTicket(db, creator.id, { title: 'Ghost', status: 'todo', priority: 'low', assignedTo: 999 })
    ).rejects.toMatchObject({ statusCode: 404, message: 'Assigned employee not found' });
  });

  it('lets the creator, the assignee and admins update, nobody else', async () => {
    const ticket = await openTicket();

    await expect(updateTicket(db, await contextOf(creator), ticket.id, { status: 'active' })).resolves.toMatchObject({
      status: 'active',
    });
    await expect(updateTicket(db, await contextOf(assignee), ticket.id, { status: 'done' })).resolves.toMatchObject({
      status: 'done',
    });
    await expect(updateTicket(db, await contextOf(admin), ticket.id, { sla: '24h' })).resolves.toMatchObject({
      sla: '24h',
    });
    await expect(updateTicket(db, await contextOf(bystander), ticket.id, { status: 'closed' })).rejects.toMatchObject({
      statusCode: 403,
    });
  });

  it('clears the SLA with null', async () => {
    const ticket = await createTicket(db, creator.id, { title: 'VPN', status: 'todo', priority: 'normal', sla: '12h' });

    const updated = await updateTicket(db, await contextOf(creator), ticket.id, { sla: null });

    expect(updated.sla).toBeNull();
  });

  it('lets only the creator or an admin delete', async () => {
    const ticket = await openTicket();

    await expect(deleteTicket(db, await contextOf(assignee), ticket.id)).rejects.toMatchObject({ statusCode: 403 });
    await deleteTicket(db, await contextOf(admin), ticket.id);
    expect(await db.tickets.findById(ticket.id)).toBeNull();
  });

  it('lets only the author or an admin edit a message', async () => {
    const ticket = await openTicket();
    const message = await createTicketMessage(db, ticket.id, assignee.id, 'Looking into it');

    await expect(updateTicketMessage(db, await contextOf(creator), message.id, 'Hijacked')).rejects.toMatchObject({
      statusCode: 403,
      message: 'Not allowed to edit message',
    });

    const edited = await updateTicketMessage(db, await contextOf(assignee), message.id, 'Replaced the battery');
    expect(edited.messageTxt).toBe('Replaced the battery');
    expect(edited.editedAt).not.toBeNull();
  });

  it('stores uploaded attachments under the ticket folder', async () => {
    const ticket = await openTicket();

    const attachment = await createTicketAttachment(db, storage, ticket.id, {}, {
      fieldName: 'file',
      fileName: 'screen.png',
      mimeType: 'image/png',
      content: Buffer.from('png-bytes'),
    });

    expect(attachment.fileName).toBe('screen.png');
    expect(attachment.fileType).toBe('image/png');
    expect(attachment.filePath).toMatch(new RegExp(`^tickets/${ticket.id}/[0-9a-f]{32}\\.png$`));
    expect((await readTicketAttachment(storage, attachment))?.toString()).toBe('png-bytes');
  });

  it('records metadata-only attachments without reading client paths', async () => {
    const ticket = await openTicket();

    const attachment = await createTicketAttachment(db, storage, ticket.id, {
      fileName: 'invoice.pdf',
      filePath: '../secrets/invoice.pdf',
    });

    expect(attachment).toMatchObject({ fileName: 'invoice.pdf', filePath: '../secrets/invoice.pdf', fileType: null });
    expect(await readTicketAttachment(storage, attachment)).toBeNull();
  });

  it('refuses metadata paths that alias a stored upload', async () => {
    const ticket = await openTicket();
    const upload = await createTicketAttachment(db, storage, ticket.id, {}, {
      fieldName: 'file',
      fileName: 'dump.txt',
      mimeType: 'text/plain',
      content: Buffer.from('dump'),
    });
    const stored = upload.filePath ?? '';

    for (const filePath of [stored, `./${stored}`, `/${stored}`, stored.replace(/\//g, '\\')]) {
      await expect(
        createTicketAttachment(db, storage, ticket.id, { fileName: 'alias.txt', filePath })
      ).rejects.toMatchObject({ statusCode: 400, message: 'filePath cannot point into attachment storage' });
    }

    expect(await db.ticketAttachments.listByTicket(ticket.id)).toHaveLength(1);
    expect(storage.files.get(stored)?.toString()).toBe('dump');
  });

  it('rejects a message from another ticket', async () => {
    const ticket = await openTicket();
    const other = await openTicket();
    const message = await createTicketMessage(db, other.id, creator.id, 'Elsewhere');

    await expect(
      createTicketAttachment(db, storage, ticket.id, { ticketMessageId: message.id, fileName: 'a.txt' })
    ).rejects.toMatchObject({ statusCode: 400, message: 'Message does not belong to this ticket' });
  });

  it('requires a file or a file name', async () => {
    const ticket = await openTicket();

    await expect(createTicketAttachment(db, storage, ticket.id, {})).rejects.toMatchObject({
      statusCode: 400,
      message: 'Either a file or a fileName is required',
    });
  });

  it('deletes attachments for admins only and removes the stored file', async () => {
    const ticket = await openTicket();
    const attachment = await createTicketAttachment(db, storage, ticket.id, {}, {
      fieldName: 'file',
      fileName: 'log.txt',
      mimeType: 'text/plain',
      content: Buffer.from('log'),
    });

    await expect(deleteTicketAttachment(db, storage, await contextOf(creator), attachment.id)).rejects.toMatchObject({
      statusCode: 403,
    });

    await deleteTicketAttachment(db, storage, await contextOf(admin), attachment.id);
    expect(storage.files.size).toBe(0);
  });
});
