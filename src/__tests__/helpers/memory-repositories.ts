import type {
  CountryRepository,
  CurriculumRepository,
  EmployeeRepository,
  HardwareRepository,
  JobRepository,
  LicenseRepository,
  ModuleRepository,
  PermissionRepository,
  Repositories,
  RoleRepository,
  TicketAttachmentRepository,
  TicketMessageRepository,
  TicketMessageWithAuthor,
  TicketRepository,
} from '../../repositories/types';
import type { AppModule, ModuleInfo, ModulePermission, Role } from '../../types/access.types';
import type { Country, Employee, EmployeeSummary, EmployeeWrite } from '../../types/employee.types';
import type { HardwareItem, License } from '../../types/inventory.types';
import type { Curriculum, Job } from '../../types/recruiting.types';
import type { Ticket, TicketAttachment, TicketMessage, TicketWithPeople } from '../../types/ticket.types';

/** Array-backed table with serial ids; rows are copied on the way out. */
class MemoryTable<T extends { id: number }> {
  readonly rows: T[] = [];
  private nextId = 1;

  insert(build: (id: number) => T): T {
    const row = build(this.nextId++);
    this.rows.push(row);
    return { ...row };
  }

  all(predicate: (row: T) => boolean = () => true): T[] {
    return this.rows.filter(predicate).map((row) => ({ ...row }));
  }

  get(id: number): T | null {
    const row = this.rows.find((r) => r.id === id);
    return row ? { ...row } : null;
  }

  patch(id: number, data: object, touch?: (row: T) => void): T | null {
    const row = this.rows.find((r) => r.id === id);
    if (!row) return null;

    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) {
        Object.assign(row, { [key]: value });
      }
    }
    touch?.(row);
    return { ...row };
  }

  remove(id: number): boolean {
    const index = this.rows.findIndex((r) => r.id === id);
    if (index === -1) return false;
    this.rows.splice(index, 1);
    return true;
  }
}

export interface MemoryState {
  countries: MemoryTable<Country>;
  employees: MemoryTable<Employee>;
  roles: MemoryTable<Role>;
  employeeRoles: Array<{ employeeId: number; roleId: number }>;
  modules: MemoryTable<AppModule>;
  permissions: ModulePermission[];
  licenses: MemoryTable<License>;
  jobs: MemoryTable<Job>;
  curriculums: MemoryTable<Curriculum>;
  hardware: MemoryTable<HardwareItem>;
  tickets: MemoryTable<Ticket>;
  ticketMessages: MemoryTable<TicketMessage>;
  ticketAttachments: MemoryTable<TicketAttachment>;
}

const tick = (() => {
  // Strictly increasing timestamps keep "newest first" ordering deterministic.
  let last = Date.UTC(2024, 0, 1);
  return () => new Date(++last);
})();

function summarize(employee: Employee | null): EmployeeSummary | null {
  if (!employee) return null;
  return { id: employee.id, displayName: employee.displayName, email: employee.email, title: employee.title };
}

function moduleInfo(module: AppModule): ModuleInfo {
  return {
    id: module.id,
    name: module.name,
    key: module.key,
    routeUrl: module.routeUrl,
    icon: module.icon,
    displayOrder: module.displayOrder,
    parentModuleId: module.parentModuleId,
  };
}

function countryRepository(state: MemoryState): CountryRepository {
  return {
    list: async () => state.countries.all().sort((a, b) => a.name.localeCompare(b.name)),
    findById: async (id) => state.countries.get(id),
    findByName: async (name) => state.countries.all((c) => c.name === name)[0] ?? null,
    create: async (name) => state.countries.insert((id) => ({ id, name })),
  };
}

function employeeRepository(state: MemoryState): EmployeeRepository {
  const build = (id: number, data: EmployeeWrite): Employee => {
    const now = tick();
    return {
      id,
      azureOid: data.azureOid ?? null,
      azureUpn: data.azureUpn ?? null,
      firstName: data.firstName ?? null,
      lastName: data.lastName ?? null,
      displayName: data.displayName ?? null,
      title: data.title ?? null,
      department: data.department ?? null,
      office: data.office ?? null,
      email: data.email ?? null,
      mobilePhone: data.mobilePhone ?? null,
      officePhone: data.officePhone ?? null,
      streetAddress: data.streetAddress ?? null,
      city: data.city ?? null,
      state: data.state ?? null,
      postalCode: data.postalCode ?? null,
      countryId: data.countryId ?? null,
      lastSyncedAt: data.lastSyncedAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
  };

  return {
    list: async () => state.employees.all(),
    findById: async (id) => state.employees.get(id),
    findByAzureOid: async (azureOid) => state.employees.all((e) => e.azureOid === azureOid)[0] ?? null,
    create: async (data) => {
      if (data.azureOid && state.employees.rows.some((e) => e.azureOid === data.azureOid)) {
        throw new Error('duplicate key value violates unique constraint "employees_azure_oid_key"');
      }
      return state.employees.insert((id) => build(id, data));
    },
    update: async (id, data) =>
      state.employees.patch(id, data, (row) => {
        row.updatedAt = tick();
      }),
    delete: async (id) => {
      state.employeeRoles = state.employeeRoles.filter((er) => er.employeeId !== id);
      return state.employees.remove(id);
    },
  };
}

function roleRepository(state: MemoryState): RoleRepository {
  return {
    list: async () => state.roles.all(),
    findById: async (id) => state.roles.get(id),
    create: async (data) =>
      state.roles.insert((id) => ({ id, name: data.name, description: data.description ?? null, createdAt: tick() })),
    update: async (id, data) => state.roles.patch(id, data),
    delete: async (id) => {
      state.employeeRoles = state.employeeRoles.filter((er) => er.roleId !== id);
      state.permissions = state.permissions.filter((p) => p.roleId !== id);
      return state.roles.remove(id);
    },
    listForEmployee: async (employeeId) => {
      const roleIds = state.employeeRoles.filter((er) => er.employeeId === employeeId).map((er) => er.roleId);
      return state.roles.all((r) => roleIds.includes(r.id)).sort((a, b) => a.id - b.id);
    },
    assignToEmployee: async (employeeId, roleId) => {
      if (state.employeeRoles.some((er) => er.employeeId === employeeId && er.roleId === roleId)) {
        return false;
      }
      state.employeeRoles.push({ employeeId, roleId });
      return true;
    },
    removeFromEmployee: async (employeeId, roleId) => {
      const before = state.employeeRoles.length;
      state.employeeRoles = state.employeeRoles.filter((er) => !(er.employeeId === employeeId && er.roleId === roleId));
      return state.employeeRoles.length < before;
    },
  };
}

function moduleRepository(state: MemoryState): ModuleRepository {
  const ordered = (rows: AppModule[]) => rows.sort((a, b) => a.displayOrder - b.displayOrder || a.id - b.id);

  return {
    list: async (options = {}) => ordered(state.modules.all((m) => options.includeInactive === true || m.isActive)),
    findById: async (id) => state.modules.get(id),
    findByKey: async (key) => state.modules.all((m) => m.key === key)[0] ?? null,
    listChildren: async (parentId) => ordered(state.modules.all((m) => m.parentModuleId === parentId)),
    listRoots: async () => ordered(state.modules.all((m) => m.parentModuleId === null && m.isActive)),
    create: async (data) =>
      state.modules.insert((id) => ({
        id,
        name: data.name,
        key: data.key,
        description: data.description ?? null,
        icon: data.icon ?? null,
        routeUrl: data.routeUrl ?? null,
        displayOrder: data.displayOrder,
        isActive: data.isActive,
        parentModuleId: data.parentModuleId ?? null,
        createdAt: tick(),
      })),
    update: async (id, data) => state.modules.patch(id, data),
    delete: async (id) => {
      state.permissions = state.permissions.filter((p) => p.moduleId !== id);
      return state.modules.remove(id);
    },
  };
}

function permissionRepository(state: MemoryState): PermissionRepository {
  const details = (row: ModulePermission) => {
    const role = state.roles.get(row.roleId);
    const found = state.modules.get(row.moduleId);
    return {
      ...row,
      roleName: role?.name ?? '',
      moduleName: found?.name ?? '',
      moduleKey: found?.key ?? '',
    };
  };
  const locate = (roleId: number, moduleId: number) =>
    state.permissions.find((p) => p.roleId === roleId && p.moduleId === moduleId);

  return {
    list: async (filter = {}) =>
      state.permissions
        .filter((p) => filter.roleId === undefined || p.roleId === filter.roleId)
        .filter((p) => filter.moduleId === undefined || p.moduleId === filter.moduleId)
        .map(details),
    find: async (roleId, moduleId) => {
      const row = locate(roleId, moduleId);
      return row ? details(row) : null;
    },
    create: async (data) => {
      const row: ModulePermission = { ...data, assignedAt: tick() };
      state.permissions.push(row);
      return { ...row };
    },
    update: async (roleId, moduleId, data) => {
      const row = locate(roleId, moduleId);
      if (!row) return null;
      for (const [key, value] of Object.entries(data)) {
        if (value !== undefined) Object.assign(row, { [key]: value });
      }
      return { ...row };
    },
    delete: async (roleId, moduleId) => {
      const before = state.permissions.length;
      state.permissions = state.permissions.filter((p) => !(p.roleId === roleId && p.moduleId === moduleId));
      return state.permissions.length < before;
    },
    replaceForRole: async (roleId, rows) => {
      const assignedAt = tick();
      const fresh = rows.map((row): ModulePermission => ({ ...row, roleId, assignedAt }));
      state.permissions = [...state.permissions.filter((p) => p.roleId !== roleId), ...fresh];
      return fresh.map((row) => ({ ...row }));
    },
    listGrantsForEmployee: async (employeeId) => {
      const roleIds = state.employeeRoles.filter((er) => er.employeeId === employeeId).map((er) => er.roleId);
      return state.permissions
        .filter((p) => roleIds.includes(p.roleId))
        .flatMap((p) => {
          const found = state.modules.get(p.moduleId);
          if (!found) return [];
          const { roleId, moduleId: _moduleId, assignedAt: _assignedAt, ...flags } = p;
          return [{ roleId, module: moduleInfo(found), flags }];
        })
        .sort(
          (a, b) => a.module.displayOrder - b.module.displayOrder || a.module.id - b.module.id || a.roleId - b.roleId
        );
    },
  };
}

function licenseRepository(state: MemoryState): LicenseRepository {
  return {
    list: async () => state.licenses.all(),
    findById: async (id) => state.licenses.get(id),
    create: async (data) =>
      state.licenses.insert((id) => ({ id, ...data, expiryDate: data.expiryDate ?? null, createdAt: tick() })),
    update: async (id, data) => state.licenses.patch(id, data),
    delete: async (id) => state.licenses.remove(id),
  };
}

function jobRepository(state: MemoryState): JobRepository {
  return {
    list: async () => state.jobs.all(),
    listByStatus: async (status) => state.jobs.all((j) => j.status === status),
    findById: async (id) => state.jobs.get(id),
    create: async (data) =>
      state.jobs.insert((id) => ({
        id,
        title: data.title,
        description: data.description ?? null,
        requirements: data.requirements ?? null,
        location: data.location ?? null,
        salaryMin: data.salaryMin ?? null,
        salaryMax: data.salaryMax ?? null,
        status: data.status ?? 'active',
        postedAt: tick(),
        employeeId: data.employeeId ?? null,
      })),
    update: async (id, data) => state.jobs.patch(id, data),
    delete: async (id) => state.jobs.remove(id),
  };
}

function curriculumRepository(state: MemoryState): CurriculumRepository {
  return {
    list: async () => state.curriculums.all(),
    listByJob: async (jobId) => state.curriculums.all((c) => c.jobId === jobId),
    listByStatus: async (status) => state.curriculums.all((c) => c.status === status),
    findById: async (id) => state.curriculums.get(id),
    create: async (data) =>
      state.curriculums.insert((id) => ({
        id,
        jobId: data.jobId,
        name: data.name,
        email: data.email,
        phone: data.phone ?? null,
        curriculumPath: data.curriculumPath ?? null,
        coverLetter: data.coverLetter ?? null,
        status: data.status ?? 'pending',
        submittedAt: tick(),
        employeeId: data.employeeId ?? null,
      })),
    update: async (id, data) => state.curriculums.patch(id, data),
    delete: async (id) => state.curriculums.remove(id),
  };
}

function hardwareRepository(state: MemoryState): HardwareRepository {
  return {
    list: async () => state.hardware.all(),
    findById: async (id) => state.hardware.get(id),
    findBySerialNumber: async (serialNumber) => state.hardware.all((h) => h.serialNumber === serialNumber)[0] ?? null,
    create: async (data) =>
      state.hardware.insert((id) => ({
        id,
        serialNumber: data.serialNumber,
        brand: data.brand,
        model: data.model ?? null,
        deviceType: data.deviceType ?? null,
        processor: data.processor ?? null,
        ramGb: data.ramGb ?? null,
        storageType: data.storageType ?? null,
        storageSizeGb: data.storageSizeGb ?? null,
        gpu: data.gpu ?? null,
        operatingSystem: data.operatingSystem ?? null,
        warrantyStartDate: data.warrantyStartDate ?? null,
        warrantyEndDate: data.warrantyEndDate ?? null,
        purchaseDate: data.purchaseDate ?? null,
        employeeId: data.employeeId ?? null,
        location: data.location ?? null,
        status: data.status ?? 'Active',
        notes: data.notes ?? null,
        createdAt: tick(),
        updatedAt: null,
      })),
    update: async (id, data) =>
      state.hardware.patch(id, data, (row) => {
        row.updatedAt = tick();
      }),
    delete: async (id) => state.hardware.remove(id),
  };
}

function ticketRepository(state: MemoryState): TicketRepository {
  const withPeople = (ticket: Ticket): TicketWithPeople => ({
    ...ticket,
    creator: summarize(state.employees.get(ticket.createdBy)),
    assignee: ticket.assignedTo === null ? null : summarize(state.employees.get(ticket.assignedTo)),
  });

  return {
    list: async (filters) => {
      const search = filters.search?.toLowerCase();
      return state.tickets
        .all(
          (t) =>
            (!filters.status || t.status === filters.status) &&
            (!filters.priority || t.priority === filters.priority) &&
            (!filters.sla || t.sla === filters.sla) &&
            (filters.assignedTo === undefined || t.assignedTo === filters.assignedTo) &&
            (filters.createdBy === undefined || t.createdBy === filters.createdBy) &&
            (!search ||
              t.title.toLowerCase().includes(search) ||
              (t.description ?? '').toLowerCase().includes(search))
        )
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .slice(filters.skip, filters.skip + filters.limit)
        .map(withPeople);
    },
    findById: async (id) => {
      const ticket = state.tickets.get(id);
      return ticket ? withPeople(ticket) : null;
    },
    create: async (data) => {
      const now = tick();
      const ticket = state.tickets.insert((id) => ({
        id,
        title: data.title,
        description: data.description ?? null,
        status: data.status,
        priority: data.priority,
        sla: data.sla ?? null,
        createdBy: data.createdBy,
        assignedTo: data.assignedTo ?? null,
        createdAt: now,
        updatedAt: now,
      }));
      return withPeople(ticket);
    },
    update: async (id, data) => {
      const ticket = state.tickets.patch(id, data, (row) => {
        row.updatedAt = tick();
      });
      return ticket ? withPeople(ticket) : null;
    },
    delete: async (id) => {
      state.ticketMessages.rows.splice(0, state.ticketMessages.rows.length, ...state.ticketMessages.rows.filter((m) => m.ticketId !== id));
      state.ticketAttachments.rows.splice(
        0,
        state.ticketAttachments.rows.length,
        ...state.ticketAttachments.rows.filter((a) => a.ticketId !== id)
      );
      return state.tickets.remove(id);
    },
  };
}

function ticketMessageRepository(state: MemoryState): TicketMessageRepository {
  const withAuthor = (message: TicketMessage): TicketMessageWithAuthor => {
    const author = state.employees.get(message.userId);
    return {
      ...message,
      user: author
        ? {
            id: author.id,
            firstName: author.firstName,
            lastName: author.lastName,
            displayName: author.displayName,
            title: author.title,
          }
        : null,
    };
  };

  return {
    listByTicket: async (ticketId) =>
      state.ticketMessages
        .all((m) => m.ticketId === ticketId)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .map(withAuthor),
    findById: async (id) => {
      const message = state.ticketMessages.get(id);
      return message ? withAuthor(message) : null;
    },
    create: async (data) =>
      withAuthor(state.ticketMessages.insert((id) => ({ id, ...data, createdAt: tick(), updatedAt: null, editedAt: null }))),
    update: async (id, messageTxt) => {
      const stamp = tick();
      const message = state.ticketMessages.patch(id, { messageTxt, updatedAt: stamp, editedAt: stamp });
      return message ? withAuthor(message) : null;
    },
    delete: async (id) => {
      state.ticketAttachments.rows.splice(
        0,
        state.ticketAttachments.rows.length,
        ...state.ticketAttachments.rows.filter((a) => a.ticketMessageId !== id)
      );
      return state.ticketMessages.remove(id);
    },
  };
}

function ticketAttachmentRepository(state: MemoryState): TicketAttachmentRepository {
  return {
    listByTicket: async (ticketId) => state.ticketAttachments.all((a) => a.ticketId === ticketId),
    findById: async (id) => state.ticketAttachments.get(id),
    create: async (data) => state.ticketAttachments.insert((id) => ({ id, ...data, createdAt: tick() })),
    delete: async (id) => state.ticketAttachments.remove(id),
  };
}

export function createMemoryState(): MemoryState {
  return {
    countries: new MemoryTable<Country>(),
    employees: new MemoryTable<Employee>(),
    roles: new MemoryTable<Role>(),
    employeeRoles: [],
    modules: new MemoryTable<AppModule>(),
    permissions: [],
    licenses: new MemoryTable<License>(),
    jobs: new MemoryTable<Job>(),
    curriculums: new MemoryTable<Curriculum>(),
    hardware: new MemoryTable<HardwareItem>(),
    tickets: new MemoryTable<Ticket>(),
    ticketMessages: new MemoryTable<TicketMessage>(),
    ticketAttachments: new MemoryTable<TicketAttachment>(),
  };
}

/** Implements every repository over plain arrays, for service and route tests. */
export function createMemoryRepositories(state: MemoryState = createMemoryState()): Repositories {
  return {
    countries: countryRepository(state),
    employees: employeeRepository(state),
    roles: roleRepository(state),
    modules: moduleRepository(state),
    permissions: permissionRepository(state),
    licenses: licenseRepository(state),
    jobs: jobRepository(state),
    curriculums: curriculumRepository(state),
    hardware: hardwareRepository(state),
    tickets: ticketRepository(state),
    ticketMessages: ticketMessageRepository(state),
    ticketAttachments: ticketAttachmentRepository(state),
  };
}
