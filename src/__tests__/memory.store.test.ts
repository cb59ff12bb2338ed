import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryCredentialStore } from '../models/memory.store';
import { DuplicateEmailError, DuplicateRoleError, InvalidReferenceError, RoleInUseError } from '../utils/errors';

const CREATED = new Date('2026-03-01T12:00:00.000Z');
const UPDATED = new Date('2026-03-02T12:00:00.000Z');

describe('InMemoryCredentialStore', () => {
  let store: InMemoryCredentialStore;
  let now: Date;

  beforeEach(() => {
    now = CREATED;
    store = new InMemoryCredentialStore(undefined, () => now);
  });

  const ada = { name: 'Ada', email: 'Ada@Example.com', password_hash: 'hash-1', role_id: 2 };

  it('seeds the default roles', async () => {
    expect(await store.listRoles()).toEqual([
      { id: 1, name: 'admin' },
      { id: 2, name: 'doctor' },
      { id: 3, name: 'patient' },
    ]);
    expect(await store.roleExists(3)).toBe(true);
    expect(await store.roleExists(4)).toBe(false);
  });

  it('creates users with normalised email and timestamps', async () => {
    const user = await store.createUser(ada);

    expect(user).toEqual({
      id: 1,
      name: 'Ada',
      email: 'ada@example.com',
      password_hash: 'hash-1',
      role_id: 2,
      created_at: CREATED,
      updated_at: CREATED,
    });
    expect(await store.findUserByEmail('ADA@example.COM')).toEqual(user);
    expect(await store.findUserById(1)).toEqual(user);
    expect(await store.findUserById(2)).toBeNull();
  });

  it('treats emails case-insensitively for uniqueness', async () => {
    await store.createUser(ada);

    await expect(store.createUser({ ...ada, email: 'ada@example.com' })).rejects.toBeInstanceOf(DuplicateEmailError);
  });

  it('admits exactly one of two concurrent creates with the same email', async () => {
    const results = await Promise.allSettled([store.createUser(ada), store.createUser({ ...ada, name: 'Other' })]);

    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect((await store.listUsers()).map((user) => user.email)).toEqual(['ada@example.com']);
  });

  it('rejects unknown roles on create', async () => {
    await expect(store.createUser({ ...ada, role_id: 99 })).rejects.toBeInstanceOf(InvalidReferenceError);
    expect(await store.listUsers()).toEqual([]);
  });

  it('updates only supplied fields', async () => {
    const created = await store.createUser(ada);
    now = UPDATED;

    const updated = await store.updateUser(created.id, { name: 'Ada L.' });

    expect(updated).toEqual({ ...created, name: 'Ada L.', updated_at: UPDATED });
  });

  it('leaves the record unchanged when the new role does not exist', async () => {
    const created = await store.createUser(ada);

    await expect(store.updateUser(created.id, { role_id: 99, name: 'Changed' })).rejects.toBeInstanceOf(
      InvalidReferenceError
    );
    expect(await store.findUserById(created.id)).toEqual(created);
  });

  it('rejects taking another user email but allows keeping your own', async () => {
    const first = await store.createUser(ada);
    const second = await store.createUser({ ...ada, email: 'bob@example.com' });

    await expect(store.updateUser(second.id, { email: 'ADA@example.com' })).rejects.toBeInstanceOf(DuplicateEmailError);
    await expect(store.updateUser(first.id, { email: 'ada@EXAMPLE.com' })).resolves.toMatchObject({
      email: 'ada@example.com',
    });
  });

  it('returns null when updating a missing user', async () => {
    expect(await store.updateUser(5, { name: 'Nobody' })).toBeNull();
  });

  it('deletes once', async () => {
    const created = await store.createUser(ada);

    expect(await store.deleteUser(created.id)).toBe(true);
    expect(await store.deleteUser(created.id)).toBe(false);
  });

  it('filters users by role', async () => {
    await store.createUser(ada);
    await store.createUser({ ...ada, email: 'pat@example.com', role_id: 3 });

    expect((await store.listUsers({ roleId: 3 })).map((user) => user.email)).toEqual(['pat@example.com']);
  });

  it('hands out copies', async () => {
    const created = await store.createUser(ada);
    created.name = 'Mutated';

    expect((await store.findUserById(created.id))?.name).toBe('Ada');
  });

  describe('roles', () => {
    it('never reuses a role id', async () => {
      const nurse = await store.createRole('nurse');
      expect(nurse).toEqual({ id: 4, name: 'nurse' });

      expect(await store.deleteRole(nurse.id)).toBe(true);
      expect(await store.createRole('pharmacist')).toEqual({ id: 5, name: 'pharmacist' });
    });

    it('rejects duplicate names', async () => {
      await expect(store.createRole('doctor')).rejects.toBeInstanceOf(DuplicateRoleError);
    });

    it('refuses to delete a role that a user holds', async () => {
      const nurse = await store.createRole('nurse');
      await store.createUser({ ...ada, role_id: nurse.id });

      await expect(store.deleteRole(nurse.id)).rejects.toBeInstanceOf(RoleInUseError);
      expect(await store.roleExists(nurse.id)).toBe(true);
    });

    it('reports a missing role', async () => {
      expect(await store.deleteRole(42)).toBe(false);
    });
  });
});
