// services/module.service.ts
import type { Repositories } from '../repositories/types';
import type { CreateModuleInput, UpdateModuleInput } from '../schemas/access.zod';
import type { AppModule } from '../types/access.types';
import { BadRequestError, NotFoundError } from '../utils/errors';

export class ModuleService {
  static async getById(db: Repositories, id: number): Promise<AppModule> {
    const found = await db.modules.findById(id);
    if (!found) throw new NotFoundError('Module not found');
    return found;
  }

  static async getByKey(db: Repositories, key: string): Promise<AppModule> {
    const found = await db.modules.findByKey(key);
    if (!found) throw new NotFoundError('Module not found');
    return found;
  }

  static list(db: Repositories, includeInactive: boolean) {
    return db.modules.list({ includeInactive });
  }

  static listRoots(db: Repositories) {
    return db.modules.listRoots();
  }

  static async listChildren(db: Repositories, parentId: number) {
    await this.getById(db, parentId);
    return db.modules.listChildren(parentId);
  }

  static async createModule(db: Repositories, data: CreateModuleInput) {
    await this.assertKeyAvailable(db, data.key);

    if (data.parentModuleId !== undefined && data.parentModuleId !== null) {
      await this.getParent(db, data.parentModuleId);
    }

    return db.modules.create(data);
  }

  static async updateModule(db: Repositories, id: number, data: UpdateModuleInput) {
    const found = await this.getById(db, id);

    if (data.key !== undefined && data.key !== found.key) {
      await this.assertKeyAvailable(db, data.key);
    }

    if (data.parentModuleId !== undefined && data.parentModuleId !== null) {
      if (data.parentModuleId === id) {
        throw new BadRequestError('A module cannot be its own parent');
      }
      await this.getParent(db, data.parentModuleId);
      await this.assertNoCycle(db, id, data.parentModuleId);
    }

    const updated = await db.modules.update(id, data);
    if (!updated) throw new NotFoundError('Module not found');
    return updated;
  }

  static async deleteModule(db: Repositories, id: number) {
    await this.getById(db, id);

    const children = await db.modules.listChildren(id);
    if (children.length > 0) {
      throw new BadRequestError('Cannot delete a module that has child modules');
    }

    await db.modules.delete(id);
  }

  static async toggleActive(db: Repositories, id: number) {
    const found = await this.getById(db, id);
    const updated = await db.modules.update(id, { isActive: !found.isActive });
    if (!updated) throw new NotFoundError('Module not found');
    return updated;
  }

  private static async assertKeyAvailable(db: Repositories, key: string) {
    if (await db.modules.findByKey(key)) {
      throw new BadRequestError(`Module key "${key}" already exists`);
    }
  }

  private static async getParent(db: Repositories, parentId: number) {
    const parent = await db.modules.findById(parentId);
    if (!parent) throw new NotFoundError('Parent module not found');
    return parent;
  }

  /** Walks up from the new parent; reaching `moduleId` means the link would close a loop. */
  private static async assertNoCycle(db: Repositories, moduleId: number, newParentId: number) {
    const seen = new Set<number>();
    let current: number | null = newParentId;

    while (current !== null) {
      if (current === moduleId) {
        throw new BadRequestError('Parent assignment would create a cycle');
      }
      if (seen.has(current)) break;
      seen.add(current);

      const ancestor: AppModule | null = await db.modules.findById(current);
      current = ancestor ? ancestor.parentModuleId : null;
    }
  }
}
