import type { AppModule, ModulePermission, ModulePermissionDetails, Role, RoleModuleGrant, CapabilityFlags } from '../types/access.types';
import type { Country, Employee, EmployeeWrite } from '../types/employee.types';
import type { HardwareItem, License } from '../types/inventory.types';
import type { Curriculum, Job } from '../types/recruiting.types';
import type {
  MessageAuthor,
  TicketAttachment,
  TicketFilters,
  TicketMessage,
  TicketWithPeople,
} from '../types/ticket.types';
import type {
  CreateModuleInput,
  CreatePermissionInput,
  CreateRoleInput,
  UpdateModuleInput,
  UpdatePermissionInput,
  UpdateRoleInput,
} from '../schemas/access.zod';
import type {
  CreateHardwareInput,
  CreateLicenseInput,
  UpdateHardwareInput,
  UpdateLicenseInput,
} from '../schemas/inventory.zod';
import type {
  CreateCurriculumInput,
  CreateJobInput,
  UpdateCurriculumInput,
  UpdateJobInput,
} from '../schemas/recruiting.zod';
import type { CreateTicketInput, UpdateTicketInput } from '../schemas/ticket.zod';

export interface CrudRepository<T, TCreate, TUpdate> {
  list(): Promise<T[]>;
  findById(id: number): Promise<T | null>;
  create(data: TCreate): Promise<T>;
  update(id: number, data: TUpdate): Promise<T | null>;
  delete(id: number): Promise<boolean>;
}

export interface CountryRepository {
  list(): Promise<Country[]>;
  findById(id: number): Promise<Country | null>;
  findByName(name: string): Promise<Country | null>;
  create(name: string): Promise<Country>;
}

export interface EmployeeRepository extends CrudRepository<Employee, EmployeeWrite, EmployeeWrite> {
  findByAzureOid(azureOid: string): Promise<Employee | null>;
}

export interface RoleRepository extends CrudRepository<Role, CreateRoleInput, UpdateRoleInput> {
  listForEmployee(employeeId: number): Promise<Role[]>;
  /** Returns false when the pair already existed. */
  assignToEmployee(employeeId: number, roleId: number): Promise<boolean>;
  removeFromEmployee(employeeId: number, roleId: number): Promise<boolean>;
}

export interface ModuleRepository {
  list(options?: { includeInactive?: boolean }): Promise<AppModule[]>;
  findById(id: number): Promise<AppModule | null>;
  findByKey(key: string): Promise<AppModule | null>;
  listChildren(parentId: number): Promise<AppModule[]>;
  listRoots(): Promise<AppModule[]>;
  create(data: CreateModuleInput): Promise<AppModule>;
  update(id: number, data: UpdateModuleInput): Promise<AppModule | null>;
  delete(id: number): Promise<boolean>;
}

export interface PermissionRepository {
  list(filter?: { roleId?: number; moduleId?: number }): Promise<ModulePermissionDetails[]>;
  find(roleId: number, moduleId: number): Promise<ModulePermissionDetails | null>;
  create(data: CreatePermissionInput): Promise<ModulePermission>;
  update(roleId: number, moduleId: number, data: UpdatePermissionInput): Promise<ModulePermission | null>;
  delete(roleId: number, moduleId: number): Promise<boolean>;
  /** Deletes every row of the role and inserts the given ones atomically. */
  replaceForRole(roleId: number, rows: Array<{ moduleId: number } & CapabilityFlags>): Promise<ModulePermission[]>;
  /** Permission rows of every role assigned to the employee, joined with their module. */
  listGrantsForEmployee(employeeId: number): Promise<RoleModuleGrant[]>;
}

export type LicenseRepository = CrudRepository<License, CreateLicenseInput, UpdateLicenseInput>;

export interface JobRepository extends CrudRepository<Job, CreateJobInput, UpdateJobInput> {
  listByStatus(status: string): Promise<Job[]>;
}

export interface CurriculumRepository extends CrudRepository<Curriculum, CreateCurriculumInput, UpdateCurriculumInput> {
  listByJob(jobId: number): Promise<Curriculum[]>;
  listByStatus(status: string): Promise<Curriculum[]>;
}

export interface HardwareRepository extends CrudRepository<HardwareItem, CreateHardwareInput, UpdateHardwareInput> {
  findBySerialNumber(serialNumber: string): Promise<HardwareItem | null>;
}

export type TicketCreateData = CreateTicketInput & { createdBy: number };

export interface TicketRepository {
  list(filters: TicketFilters): Promise<TicketWithPeople[]>;
  findById(id: number): Promise<TicketWithPeople | null>;
  create(data: TicketCreateData): Promise<TicketWithPeople>;
  update(id: number, data: UpdateTicketInput): Promise<TicketWithPeople | null>;
  delete(id: number): Promise<boolean>;
}

export interface TicketMessageWithAuthor extends TicketMessage {
  user: MessageAuthor | null;
}

export interface TicketMessageRepository {
  listByTicket(ticketId: number): Promise<TicketMessageWithAuthor[]>;
  findById(id: number): Promise<TicketMessageWithAuthor | null>;
  create(data: { ticketId: number; userId: number; messageTxt: string }): Promise<TicketMessageWithAuthor>;
  /** Stamps both `updatedAt` and `editedAt`. */
  update(id: number, messageTxt: string): Promise<TicketMessageWithAuthor | null>;
  delete(id: number): Promise<boolean>;
}

export type TicketAttachmentCreateData = Omit<TicketAttachment, 'id' | 'createdAt'>;

export interface TicketAttachmentRepository {
  listByTicket(ticketId: number): Promise<TicketAttachment[]>;
  findById(id: number): Promise<TicketAttachment | null>;
  create(data: TicketAttachmentCreateData): Promise<TicketAttachment>;
  delete(id: number): Promise<boolean>;
}

/** Everything the application reads and writes, injected into Fastify as `app.db`. */
export interface Repositories {
  countries: CountryRepository;
  employees: EmployeeRepository;
  roles: RoleRepository;
  modules: ModuleRepository;
  permissions: PermissionRepository;
  licenses: LicenseRepository;
  jobs: JobRepository;
  curriculums: CurriculumRepository;
  hardware: HardwareRepository;
  tickets: TicketRepository;
  ticketMessages: TicketMessageRepository;
  ticketAttachments: TicketAttachmentRepository;
}
