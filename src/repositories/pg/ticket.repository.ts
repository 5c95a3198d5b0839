import type { Queryable } from '../../lib/db';
import type { Ticket, TicketAttachment, TicketFilters, TicketWithPeople } from '../../types/ticket.types';
import type { UpdateTicketInput } from '../../schemas/ticket.zod';
import type {
  TicketAttachmentCreateData,
  TicketAttachmentRepository,
  TicketCreateData,
  TicketMessageRepository,
  TicketMessageWithAuthor,
  TicketRepository,
} from '../types';
import { PgTable } from './table';

const employeeSummary = (alias: string) =>
  `CASE WHEN ${alias}.id IS NULL THEN NULL ELSE json_build_object(
     'id', ${alias}.id, 'displayName', ${alias}.display_name, 'email', ${alias}.email, 'title', ${alias}.title
   ) END`;

const TICKET_SELECT = `
  SELECT t.id, t.title, t.description, t.status, t.priority, t.sla,
         t.created_by AS "createdBy", t.assigned_to AS "assignedTo",
         t.created_at AS "createdAt", t.updated_at AS "updatedAt",
         ${employeeSummary('c')} AS "creator",
         ${employeeSummary('a')} AS "assignee"
  FROM tickets t
  LEFT JOIN employees c ON c.id = t.created_by
  LEFT JOIN employees a ON a.id = t.assigned_to`;

export class PgTicketRepository implements TicketRepository {
  private readonly table: PgTable<Ticket>;

  constructor(private readonly db: Queryable) {
    this.table = new PgTable<Ticket>(db, {
      name: 'tickets',
      columns: {
        id: 'id',
        title: 'title',
        description: 'description',
        status: 'status',
        priority: 'priority',
        sla: 'sla',
        createdBy: 'created_by',
        assignedTo: 'assigned_to',
        createdAt: 'created_at',
        updatedAt: 'updated_at',
      },
    });
  }

  async list(filters: TicketFilters) {
    const conditions: string[] = [];
    const values: unknown[] = [];
    const bind = (value: unknown) => {
      values.push(value);
      return `$${values.length}`;
    };

    if (filters.status) conditions.push(`t.status = ${bind(filters.status)}`);
    if (filters.priority) conditions.push(`t.priority = ${bind(filters.priority)}`);
    if (filters.sla) conditions.push(`t.sla = ${bind(filters.sla)}`);
    if (filters.assignedTo !== undefined) conditions.push(`t.assigned_to = ${bind(filters.assignedTo)}`);
    if (filters.createdBy !== undefined) conditions.push(`t.created_by = ${bind(filters.createdBy)}`);
    if (filters.search) {
      const pattern = bind(`%${filters.search}%`);
      conditions.push(`(t.title ILIKE ${pattern} OR t.description ILIKE ${pattern})`);
    }

    const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query<TicketWithPeople>(
      `${TICKET_SELECT}${where} ORDER BY t.created_at DESC, t.id DESC OFFSET ${bind(filters.skip)} LIMIT ${bind(filters.limit)}`,
      values
    );
    return rows;
  }

  async findById(id: number) {
    const { rows } = await this.db.query<TicketWithPeople>(`${TICKET_SELECT} WHERE t.id = $1`, [id]);
    return rows[0] ?? null;
  }

  async create(data: TicketCreateData) {
    const ticket = await this.table.insert(data);
    return this.loadExisting(ticket.id);
  }

  async update(id: number, data: UpdateTicketInput) {
    const ticket = await this.table.update(id, data, ['updated_at = now()']);
    return ticket ? this.loadExisting(ticket.id) : null;
  }

  delete(id: number) {
    return this.table.delete(id);
  }

  private async loadExisting(id: number) {
    const ticket = await this.findById(id);
    if (!ticket) {
      throw new Error(`Ticket ${id} vanished after write`);
    }
    return ticket;
  }
}

const MESSAGE_SELECT = `
  SELECT tm.id, tm.ticket_id AS "ticketId", tm.user_id AS "userId", tm.message_txt AS "messageTxt",
         tm.created_at AS "createdAt", tm.updated_at AS "updatedAt", tm.edited_at AS "editedAt",
         CASE WHEN e.id IS NULL THEN NULL ELSE json_build_object(
           'id', e.id, 'firstName', e.first_name, 'lastName', e.last_name,
           'displayName', e.display_name, 'title', e.title
         ) END AS "user"
  FROM ticket_messages tm
  LEFT JOIN employees e ON e.id = tm.user_id`;

export class PgTicketMessageRepository implements TicketMessageRepository {
  constructor(private readonly db: Queryable) {}

  async listByTicket(ticketId: number) {
    const { rows } = await this.db.query<TicketMessageWithAuthor>(
      `${MESSAGE_SELECT} WHERE tm.ticket_id = $1 ORDER BY tm.created_at, tm.id`,
      [ticketId]
    );
    return rows;
  }

  async findById(id: number) {
    const { rows } = await this.db.query<TicketMessageWithAuthor>(`${MESSAGE_SELECT} WHERE tm.id = $1`, [id]);
    return rows[0] ?? null;
  }

  async create(data: { ticketId: number; userId: number; messageTxt: string }) {
    const { rows } = await this.db.query<{ id: number }>(
      'INSERT INTO ticket_messages (ticket_id, user_id, message_txt) VALUES ($1, $2, $3) RETURNING id',
      [data.ticketId, data.userId, data.messageTxt]
    );
    const message = await this.findById(rows[0].id);
    if (!message) {
      throw new Error(`Ticket message ${rows[0].id} vanished after insert`);
    }
    return message;
  }

  async update(id: number, messageTxt: string) {
    const { rowCount } = await this.db.query(
      'UPDATE ticket_messages SET message_txt = $2, updated_at = now(), edited_at = now() WHERE id = $1',
      [id, messageTxt]
    );
    return (rowCount ?? 0) > 0 ? this.findById(id) : null;
  }

  async delete(id: number) {
    const { rowCount } = await this.db.query('DELETE FROM ticket_messages WHERE id = $1', [id]);
    return (rowCount ?? 0) > 0;
  }
}

export class PgTicketAttachmentRepository implements TicketAttachmentRepository {
  private readonly table: PgTable<TicketAttachment>;

  constructor(db: Queryable) {
    this.table = new PgTable<TicketAttachment>(db, {
      name: 'ticket_attachments',
      columns: {
        id: 'id',
        ticketId: 'ticket_id',
        ticketMessageId: 'ticket_message_id',
        fileName: 'file_name',
        fileType: 'file_type',
        filePath: 'file_path',
        createdAt: 'created_at',
      },
      orderBy: 'created_at, id',
    });
  }

  listByTicket(ticketId: number) {
    return this.table.findAll('ticket_id = $1', [ticketId]);
  }

  findById(id: number) {
    return this.table.findById(id);
  }

  create(data: TicketAttachmentCreateData) {
    return this.table.insert(data);
  }

  delete(id: number) {
    return this.table.delete(id);
  }
}
