import type { DirectoryUser, DirectoryUserUpdate } from '../../types/directory.types';
import type { Employee, EmployeeFields } from '../../types/employee.types';

/** Employee columns the directory owns. Country and sync stamp are resolved separately. */
export type DirectoryEmployeeFields = Omit<EmployeeFields, 'countryId' | 'lastSyncedAt'>;

export function mapDirectoryUserToEmployee(user: DirectoryUser): DirectoryEmployeeFields {
  return {
    azureOid: user.id,
    azureUpn: user.userPrincipalName ?? null,
    firstName: user.givenName ?? null,
    lastName: user.surname ?? null,
    displayName: user.displayName ?? null,
    title: user.jobTitle ?? null,
    department: user.department ?? null,
    office: user.officeLocation ?? null,
    email: user.mail || user.userPrincipalName || null,
    mobilePhone: user.mobilePhone ?? null,
    officePhone: user.businessPhones?.[0] ?? null,
    streetAddress: user.streetAddress ?? null,
    city: user.city ?? null,
    state: user.state ?? null,
    postalCode: user.postalCode ?? null,
  };
}

/**
 * Inverse of {@link mapDirectoryUserToEmployee} for a push. Empty local
 * values are left out so they never blank a directory attribute.
 */
export function mapEmployeeToDirectoryUpdate(employee: Employee, countryCode?: string | null): DirectoryUserUpdate {
  const update: DirectoryUserUpdate = {};
  const set = <K extends keyof DirectoryUserUpdate>(key: K, value: DirectoryUserUpdate[K] | null | undefined) => {
    if (value !== null && value !== undefined && value !== '') {
      update[key] = value;
    }
  };

  set('givenName', employee.firstName);
  set('surname', employee.lastName);
  set('displayName', employee.displayName);
  set('jobTitle', employee.title);
  set('department', employee.department);
  set('officeLocation', employee.office);
  set('mobilePhone', employee.mobilePhone);
  if (employee.officePhone) {
    update.businessPhones = [employee.officePhone];
  }
  set('streetAddress', employee.streetAddress);
  set('city', employee.city);
  set('state', employee.state);
  set('postalCode', employee.postalCode);
  set('country', countryCode);

  return update;
}
