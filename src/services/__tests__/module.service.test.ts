import { beforeEach, describe, expect, it } from 'vitest';
import { createMemoryRepositories } from '../../__tests__/helpers/memory-repositories';
import type { Repositories } from '../../repositories/types';
import { ModuleService } from '../module.service';

describe('ModuleService', () => {
  let db: Repositories;

  beforeEach(() => {
    db = createMemoryRepositories();
  });

  const create = (key: string, parentModuleId: number | null = null, isActive = true) =>
    ModuleService.createModule(db, { name: key, key, displayOrder: 0, isActive, parentModuleId });

  it('rejects a duplicate key', async () => {
    await create('tickets');

    await expect(create('tickets')).rejects.toMatchObject({
      statusCode: 400,
      message: 'Module key "tickets" already exists',
    });
  });

  it('requires the parent to exist', async () => {
    await expect(create('roles', 42)).rejects.toMatchObject({ statusCode: 404, message: 'Parent module not found' });
  });

  it('refuses to make a module its own parent', async () => {
    const admin = await create('administration');

    await expect(ModuleService.updateModule(db, admin.id, { parentModuleId: admin.id })).rejects.toMatchObject({
      statusCode: 400,
      message: 'A module cannot be its own parent',
    });
  });

  it('refuses a parent that would close a cycle', async () => {
    const admin = await create('administration');
    const roles = await create('roles', admin.id);
    const permissions = await create('permissions', roles.id);

    await expect(ModuleService.updateModule(db, admin.id, { parentModuleId: permissions.id })).rejects.toMatchObject({
      statusCode: 400,
      message: 'Parent assignment would create a cycle',
    });
  });

  it('allows moving a module under an unrelated branch', async () => {
    const admin = await create('administration');
    const hr = await create('hr');
    const roles = await create('roles', admin.id);

    const moved = await ModuleService.updateModule(db, roles.id, { parentModuleId: hr.id });

    expect(moved.parentModuleId).toBe(hr.id);
  });

  it('keeps modules with children from being deleted', async () => {
    const admin = await create('administration');
    await create('roles', admin.id);

    await expect(ModuleService.deleteModule(db, admin.id)).rejects.toMatchObject({ statusCode: 400 });
  });

  it('lists only active roots', async () => {
    const admin = await create('administration');
    await create('legacy', null, false);
    await create('roles', admin.id);

    expect((await ModuleService.listRoots(db)).map((m) => m.key)).toEqual(['administration']);
    expect((await ModuleService.list(db, true)).map((m) => m.key)).toEqual(['administration', 'legacy', 'roles']);
    expect((await ModuleService.list(db, false)).map((m) => m.key)).toEqual(['administration', 'roles']);
  });

  it('flips isActive on toggle', async () => {
    const admin = await create('administration');

    expect((await ModuleService.toggleActive(db, admin.id)).isActive).toBe(false);
    expect((await ModuleService.toggleActive(db, admin.id)).isActive).toBe(true);
  });
});
