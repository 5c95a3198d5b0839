import type { AggregatedPermissions, Role } from '../types/access.types';
import type { Employee } from '../types/employee.types';

/** What an employee may do, recomputed on every request. */
export interface AccessContext extends AggregatedPermissions {
  employee: Employee;
  roles: Role[];
}
