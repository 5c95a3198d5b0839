export interface Country {
  id: number;
  name: string;
}

export interface Employee {
  id: number;
  azureOid: string | null;
  azureUpn: string | null;
  firstName: string | null;
  lastName: string | null;
  displayName: string | null;
  title: string | null;
  department: string | null;
  office: string | null;
  email: string | null;
  mobilePhone: string | null;
  officePhone: string | null;
  streetAddress: string | null;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  countryId: number | null;
  lastSyncedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Writable employee columns (everything except id and bookkeeping timestamps). */
export type EmployeeFields = Omit<Employee, 'id' | 'createdAt' | 'updatedAt'>;

export type EmployeeWrite = Partial<EmployeeFields>;

export interface EmployeeSummary {
  id: number;
  displayName: string | null;
  email: string | null;
  title: string | null;
}
