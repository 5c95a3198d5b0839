import { z } from 'zod';
import { nonEmptyPatch, nullableText } from './common.zod';

const employeeShape = {
  azureOid: nullableText(64),
  azureUpn: nullableText(255),
  firstName: nullableText(100),
  lastName: nullableText(100),
  displayName: nullableText(200),
  title: nullableText(100),
  department: nullableText(100),
  office: nullableText(100),
  email: z.string().trim().email('Invalid email').max(255).nullable().optional(),
  mobilePhone: nullableText(50),
  officePhone: nullableText(50),
  streetAddress: nullableText(255),
  city: nullableText(100),
  state: nullableText(100),
  postalCode: nullableText(20),
  countryId: z.number().int().positive().nullable().optional(),
};

export const CreateEmployeeSchema = z.object(employeeShape);

export const UpdateEmployeeSchema = nonEmptyPatch(employeeShape);

export const EmployeeRoleParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
  roleId: z.coerce.number().int().positive(),
});

export type CreateEmployeeInput = z.infer<typeof CreateEmployeeSchema>;
export type UpdateEmployeeInput = z.infer<typeof UpdateEmployeeSchema>;
