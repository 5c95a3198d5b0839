import type { Database } from '../../lib/db';
import type { Repositories } from '../types';
import { PgModuleRepository, PgPermissionRepository, PgRoleRepository } from './access.repository';
import { PgCountryRepository, PgEmployeeRepository } from './employee.repository';
import { PgHardwareRepository, PgLicenseRepository } from './inventory.repository';
import { PgCurriculumRepository, PgJobRepository } from './recruiting.repository';
import { PgTicketAttachmentRepository, PgTicketMessageRepository, PgTicketRepository } from './ticket.repository';

export function createPgRepositories(db: Database): Repositories {
  return {
    countries: new PgCountryRepository(db),
    employees: new PgEmployeeRepository(db),
    roles: new PgRoleRepository(db),
    modules: new PgModuleRepository(db),
    permissions: new PgPermissionRepository(db),
    licenses: new PgLicenseRepository(db),
    jobs: new PgJobRepository(db),
    curriculums: new PgCurriculumRepository(db),
    hardware: new PgHardwareRepository(db),
    tickets: new PgTicketRepository(db),
    ticketMessages: new PgTicketMessageRepository(db),
    ticketAttachments: new PgTicketAttachmentRepository(db),
  };
}
