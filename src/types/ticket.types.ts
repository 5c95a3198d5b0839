import { EmployeeSummary } from './employee.types';

export const TICKET_STATUSES = ['todo', 'active', 'inactive', 'closed', 'done', 'in_progress', 'on_hold'] as const;
export const TICKET_PRIORITIES = ['low', 'normal', 'medium', 'high', 'urgent'] as const;
export const TICKET_SLAS = ['12h', '24h', '48h', '1w', '2w', '4w'] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];
export type TicketSla = (typeof TICKET_SLAS)[number];

export interface Ticket {
  id: number;
  title: string;
  description: string | null;
  status: TicketStatus;
  priority: TicketPriority;
  sla: TicketSla | null;
  createdBy: number;
  assignedTo: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface TicketWithPeople extends Ticket {
  creator: EmployeeSummary | null;
  assignee: EmployeeSummary | null;
}

export interface TicketFilters {
  status?: TicketStatus;
  priority?: TicketPriority;
  sla?: TicketSla;
  assignedTo?: number;
  createdBy?: number;
  search?: string;
  skip: number;
  limit: number;
}

export interface TicketMessage {
  id: number;
  ticketId: number;
  userId: number;
  messageTxt: string | null;
  createdAt: Date;
  updatedAt: Date | null;
  editedAt: Date | null;
}

export interface MessageAuthor {
  id: number;
  firstName: string | null;
  lastName: string | null;
  displayName: string | null;
  title: string | null;
}

export interface TicketAttachment {
  id: number;
  ticketId: number;
  ticketMessageId: number | null;
  fileName: string;
  fileType: string | null;
  filePath: string | null;
  createdAt: Date;
}
