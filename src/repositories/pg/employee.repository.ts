import type { Queryable } from '../../lib/db';
import type { Country, Employee, EmployeeWrite } from '../../types/employee.types';
import type { CountryRepository, EmployeeRepository } from '../types';
import { PgCrudRepository, PgTable } from './table';

export class PgCountryRepository implements CountryRepository {
  private readonly table: PgTable<Country>;

  constructor(db: Queryable) {
    this.table = new PgTable<Country>(db, {
      name: 'countries',
      columns: { id: 'id', name: 'name' },
      orderBy: 'name',
    });
  }

  list() {
    return this.table.findAll();
  }

  findById(id: number) {
    return this.table.findById(id);
  }

  findByName(name: string) {
    return this.table.findOne('name = $1', [name]);
  }

  create(name: string) {
    return this.table.insert({ name });
  }
}

export class PgEmployeeRepository
  extends PgCrudRepository<Employee, EmployeeWrite, EmployeeWrite>
  implements EmployeeRepository
{
  constructor(db: Queryable) {
    super(
      db,
      {
        name: 'employees',
        columns: {
          id: 'id',
          azureOid: 'azure_oid',
          azureUpn: 'azure_upn',
          firstName: 'first_name',
          lastName: 'last_name',
          displayName: 'display_name',
          title: 'title',
          department: 'department',
          office: 'office',
          email: 'email',
          mobilePhone: 'mobile_phone',
          officePhone: 'office_phone',
          streetAddress: 'street_address',
          city: 'city',
          state: 'state',
          postalCode: 'postal_code',
          countryId: 'country_id',
          lastSyncedAt: 'last_synced_at',
          createdAt: 'created_at',
          updatedAt: 'updated_at',
        },
      },
      ['updated_at = now()']
    );
  }

  findByAzureOid(azureOid: string) {
    return this.table.findOne('azure_oid = $1', [azureOid]);
  }
}
