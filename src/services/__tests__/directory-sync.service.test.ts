import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createMemoryRepositories } from '../../__tests__/helpers/memory-repositories';
import { FakeDirectory, silentLogger } from '../../__tests__/helpers/test-app';
import type { Repositories } from '../../repositories/types';
import type { DirectoryUser } from '../../types/directory.types';
import {
  DirectorySyncDeps,
  isOrganizationEmail,
  pullEmployeeFromDirectory,
  pushEmployeeToDirectory,
  syncEmployeesFromDirectory,
} from '../directory-sync.service';

const FIRST_RUN = new Date('2024-05-01T08:00:00.000Z');
const SECOND_RUN = new Date('2024-05-02T08:00:00.000Z');

const ana: DirectoryUser = {
  id: 'oid-ana',
  userPrincipalName: 'ana@primefire.com',
  givenName: 'Ana',
  surname: 'Diaz',
  displayName: 'Ana Diaz',
  jobTitle: null,
  mail: null,
  businessPhones: ['+1 787 555 0100'],
  country: 'Puerto Rico',
};

const carl: DirectoryUser = {
  id: 'oid-carl',
  userPrincipalName: null,
  mail: 'carl@mail.primefire.io',
  displayName: 'Carl Ruiz',
  country: 'USA',
};

const outsider: DirectoryUser = { id: 'oid-out', userPrincipalName: 'bob@notprimefire.com', displayName: 'Bob' };
const guest: DirectoryUser = { id: 'oid-guest', userPrincipalName: null, mail: null, displayName: 'Guest' };

describe('isOrganizationEmail', () => {
  it('matches when one domain label equals the token', () => {
    expect(isOrganizationEmail('ana@primefire.com', 'primefire')).toBe(true);
    expect(isOrganizationEmail('ana@mail.PrimeFire.io', 'primefire')).toBe(true);
  });

  it('rejects partial label matches and missing addresses', () => {
    expect(isOrganizationEmail('bob@notprimefire.com', 'primefire')).toBe(false);
    expect(isOrganizationEmail('bob@primefire-labs.com', 'primefire')).toBe(false);
    expect(isOrganizationEmail('primefire', 'primefire')).toBe(false);
    expect(isOrganizationEmail(null, 'primefire')).toBe(false);
  });
});

describe('syncEmployeesFromDirectory', () => {
  let db: Repositories;
  let directory: FakeDirectory;
  let deps: DirectorySyncDeps;

  beforeEach(() => {
    db = createMemoryRepositories();
    directory = new FakeDirectory([ana, outsider, carl, guest]);
    deps = { db, directory, domainToken: 'primefire', logger: silentLogger(), now: () => FIRST_RUN };
  });

  it('imports organisation users only and reports what it did', async () => {
    const stats = await syncEmployeesFromDirectory(deps);

    expect(stats).toEqual({
      totalDirectoryUsers: 4,
      organizationUsers: 2,
      processed: 2,
      created: 2,
      updated: 0,
      errors: 0,
      countriesCreated: 2,
      startedAt: FIRST_RUN,
      finishedAt: FIRST_RUN,
    });

    const employees = await db.employees.list();
    expect(employees.map((e) => e.azureOid)).toEqual(['oid-ana', 'oid-carl']);
    expect(await db.countries.list()).toEqual([
      { id: 1, name: 'PR' },
      { id: 2, name: 'US' },
    ]);
  });

  it('maps directory fields onto the employee', async () => {
    await syncEmployeesFromDirectory(deps);

    const employee = await db.employees.findByAzureOid('oid-ana');
    expect(employee).toMatchObject({
      azureUpn: 'ana@primefire.com',
      firstName: 'Ana',
      lastName: 'Diaz',
      displayName: 'Ana Diaz',
      email: 'ana@primefire.com',
      officePhone: '+1 787 555 0100',
      title: null,
      countryId: 1,
      lastSyncedAt: FIRST_RUN,
    });
  });

  it('updates existing rows on a re-run without touching anything but the sync stamp', async () => {
    await syncEmployeesFromDirectory(deps);
    const before = await db.employees.findByAzureOid('oid-ana');

    const stats = await syncEmployeesFromDirectory({ ...deps, now: () => SECOND_RUN });
    const after = await db.employees.findByAzureOid('oid-ana');

    expect(stats).toMatchObject({ created: 0, updated: 2, countriesCreated: 0, errors: 0 });
    expect((await db.employees.list()).length).toBe(2);
    expect(after).toEqual({ ...before, lastSyncedAt: SECOND_RUN, updatedAt: after?.updatedAt });
  });

  it('keeps local values when the directory field is empty', async () => {
    await syncEmployeesFromDirectory(deps);
    const local = await db.employees.findByAzureOid('oid-ana');
    await db.employees.update(local?.id ?? 0, { title: 'Engineer' });

    await syncEmployeesFromDirectory({ ...deps, now: () => SECOND_RUN });

    expect((await db.employees.findByAzureOid('oid-ana'))?.title).toBe('Engineer');
  });

  it('counts a failing record and carries on with the rest', async () => {
    const create = db.employees.create;
    db.employees.create = async (data) => {
      if (data.azureOid === 'oid-ana') throw new Error('insert failed');
      return create(data);
    };
    const warn = vi.spyOn(deps.logger, 'warn');

    const stats = await syncEmployeesFromDirectory(deps);

    expect(stats).toMatchObject({ organizationUsers: 2, processed: 1, created: 1, errors: 1 });
    expect(warn).toHaveBeenCalledWith('Failed to sync directory user', {
      azureOid: 'oid-ana',
      email: 'ana@primefire.com',
      reason: 'insert failed',
    });
    expect(await db.employees.findByAzureOid('oid-carl')).not.toBeNull();
  });

  it('counts a country created for a record whose employee write then fails', async () => {
    const create = db.employees.create;
    db.employees.create = async (data) => {
      if (data.azureOid === 'oid-ana') throw new Error('insert failed');
      return create(data);
    };

    const failed = await syncEmployeesFromDirectory(deps);
    expect(failed).toMatchObject({ errors: 1, created: 1, countriesCreated: 2 });

    db.employees.create = create;
    const retried = await syncEmployeesFromDirectory({ ...deps, now: () => SECOND_RUN });
    expect(retried).toMatchObject({ errors: 0, created: 1, updated: 1, countriesCreated: 0 });
  });

  it('propagates a failure to list directory users', async () => {
    directory.getAllUsers = async () => {
      throw new Error('graph unavailable');
    };

    await expect(syncEmployeesFromDirectory(deps)).rejects.toThrow('graph unavailable');
  });
});

describe('single-employee directory operations', () => {
  let db: Repositories;
  let directory: FakeDirectory;
  let deps: DirectorySyncDeps;

  beforeEach(() => {
    db = createMemoryRepositories();
    directory = new FakeDirectory([ana]);
    deps = { db, directory, domainToken: 'primefire', logger: silentLogger(), now: () => SECOND_RUN };
  });

  it('pulls the latest directory values into the employee', async () => {
    const employee = await db.employees.create({ azureOid: 'oid-ana', displayName: 'Old Name' });
    directory.users = [{ ...ana, displayName: 'Ana M. Diaz' }];

    const pulled = await pullEmployeeFromDirectory(deps, employee);

    expect(pulled).toMatchObject({ id: employee.id, displayName: 'Ana M. Diaz', lastSyncedAt: SECOND_RUN });
  });

  it('pushes only non-empty local fields and stamps the sync time', async () => {
    const country = await db.countries.create('PR');
    const employee = await db.employees.create({
      azureOid: 'oid-ana',
      firstName: 'Ana',
      lastName: 'Diaz',
      displayName: 'Ana Diaz',
      title: '',
      officePhone: '+1 787 555 0199',
      countryId: country.id,
    });

    const result = await pushEmployeeToDirectory(deps, employee);

    expect(directory.updates).toEqual([
      {
        userId: 'oid-ana',
        update: {
          givenName: 'Ana',
          surname: 'Diaz',
          displayName: 'Ana Diaz',
          businessPhones: ['+1 787 555 0199'],
          country: 'PR',
        },
      },
    ]);
    expect(result.employee.lastSyncedAt).toEqual(SECOND_RUN);
  });

  it('rejects employees that are not linked to the directory', async () => {
    const employee = await db.employees.create({ displayName: 'Local Only' });

    await expect(pushEmployeeToDirectory(deps, employee)).rejects.toMatchObject({
      statusCode: 422,
      message: 'Employee is not linked to a directory account',
    });
    await expect(pullEmployeeFromDirectory(deps, employee)).rejects.toMatchObject({ statusCode: 422 });
  });
});
