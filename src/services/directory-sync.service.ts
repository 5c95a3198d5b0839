import type { Repositories } from '../repositories/types';
import type { DirectoryClient, DirectoryUser, SyncStats } from '../types/directory.types';
import type { Employee, EmployeeWrite } from '../types/employee.types';
import { ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { getOrCreateCountry } from './country.service';
import { mapDirectoryUserToEmployee, mapEmployeeToDirectoryUpdate } from './graph/graph.mapper';

export interface DirectorySyncDeps {
  db: Repositories;
  directory: DirectoryClient;
  /** Domain label identifying organisation accounts, e.g. `primefire`. */
  domainToken: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * True when one dot-separated label of the address's domain equals `token`.
 * `a@mail.primefire.com` matches `primefire`; `a@notprimefire.com` does not.
 */
export function isOrganizationEmail(email: string | null | undefined, token: string): boolean {
  if (!email || !email.includes('@')) return false;

  const domain = email.toLowerCase().split('@').pop() ?? '';
  const wanted = token.toLowerCase();
  return domain.split('.').some((label) => label === wanted);
}

interface ApplyResult {
  employee: Employee;
  created: boolean;
}

/**
 * Upserts one directory user by `azureOid`. Existing rows only take the
 * non-null directory values, so a blank directory field never erases local data.
 */
async function applyDirectoryUser(
  db: Repositories,
  user: DirectoryUser,
  countryId: number | null,
  syncedAt: Date
): Promise<ApplyResult> {
  const mapped = mapDirectoryUserToEmployee(user);

  const existing = await db.employees.findByAzureOid(user.id);
  if (!existing) {
    const employee = await db.employees.create({ ...mapped, countryId, lastSyncedAt: syncedAt });
    return { employee, created: true };
  }

  const patch: EmployeeWrite = { lastSyncedAt: syncedAt };
  for (const [key, value] of Object.entries(mapped)) {
    if (value !== null) {
      Object.assign(patch, { [key]: value });
    }
  }
  if (countryId !== null) {
    patch.countryId = countryId;
  }

  const employee = (await db.employees.update(existing.id, patch)) ?? existing;
  return { employee, created: false };
}

/**
 * Pulls every directory user belonging to the organisation into the local
 * employee table. Records are written one at a time; a failing record is
 * counted in `errors` and the run moves on.
 */
export async function syncEmployeesFromDirectory(deps: DirectorySyncDeps): Promise<SyncStats> {
  const now = deps.now ?? (() => new Date());
  const stats: SyncStats = {
    totalDirectoryUsers: 0,
    organizationUsers: 0,
    processed: 0,
    created: 0,
    updated: 0,
    errors: 0,
    countriesCreated: 0,
    startedAt: now(),
    finishedAt: null,
  };

  deps.logger.info('Starting employee sync from directory');

  const users = await deps.directory.getAllUsers();
  stats.totalDirectoryUsers = users.length;

  for (const user of users) {
    const email = user.userPrincipalName || user.mail;
    if (!isOrganizationEmail(email, deps.domainToken)) {
      deps.logger.debug('Skipping directory user outside the organisation', { email: email ?? null });
      continue;
    }

    stats.organizationUsers++;

    try {
      // The country row commits on its own, so it counts even if the employee write fails.
      const country = await getOrCreateCountry(deps.db, user.country);
      if (country.created) stats.countriesCreated++;

      const result = await applyDirectoryUser(deps.db, user, country.countryId, now());
      stats.processed++;
      if (result.created) stats.created++;
      else stats.updated++;
    } catch (err) {
      stats.errors++;
      deps.logger.warn('Failed to sync directory user', {
        azureOid: user.id,
        email,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  stats.finishedAt = now();
  deps.logger.info('Employee sync finished', { ...stats });
  return stats;
}

function requireAzureOid(employee: Employee): string {
  if (!employee.azureOid) {
    throw new ValidationError('Employee is not linked to a directory account');
  }
  return employee.azureOid;
}

/** Re-reads one employee from the directory and applies the same upsert as the bulk sync. */
export async function pullEmployeeFromDirectory(deps: DirectorySyncDeps, employee: Employee): Promise<Employee> {
  const user = await deps.directory.getUser(requireAzureOid(employee));
  const now = deps.now ?? (() => new Date());

  const { countryId } = await getOrCreateCountry(deps.db, user.country);
  const result = await applyDirectoryUser(deps.db, user, countryId, now());
  return result.employee;
}

/**
 * Writes the employee's non-empty local fields to the directory. There is no
 * conflict detection; whichever side wrote last wins.
 */
export async function pushEmployeeToDirectory(
  deps: DirectorySyncDeps,
  employee: Employee
): Promise<{ employee: Employee; directoryUser: DirectoryUser }> {
  const azureOid = requireAzureOid(employee);
  const country = employee.countryId === null ? null : await deps.db.countries.findById(employee.countryId);

  const directoryUser = await deps.directory.updateUser(
    azureOid,
    mapEmployeeToDirectoryUpdate(employee, country?.name)
  );

  const now = deps.now ?? (() => new Date());
  const stamped = (await deps.db.employees.update(employee.id, { lastSyncedAt: now() })) ?? employee;

  return { employee: stamped, directoryUser };
}
