import { describe, it, expect, beforeEach } from 'vitest';
import { RoleService } from '../services/role.service';
import { UserService } from '../services/user.service';
import {
  DuplicateEmailError,
  DuplicateRoleError,
  ForbiddenError,
  InvalidReferenceError,
  NotFoundError,
  RoleInUseError,
  ValidationError,
} from '../utils/errors';
import { createFixture, type TestFixture } from './helpers';

describe('UserService', () => {
  let fixture: TestFixture;
  let users: UserService;

  beforeEach(() => {
    fixture = createFixture();
    users = new UserService(fixture.store, fixture.hasher);
  });

  const input = { name: 'Dr. Who', email: 'who@example.com', password: 'tardis', role_id: 2 };

  it('creates a user without exposing the hash', async () => {
    const user = await users.create(input);

    expect(user).toMatchObject({ id: 1, name: 'Dr. Who', email: 'who@example.com', role_id: 2 });
    expect(user).not.toHaveProperty('password_hash');
    expect(await users.list()).toEqual([user]);
  });

  it('applies registration rules on create', async () => {
    await expect(users.create({ ...input, password: 'short' })).rejects.toBeInstanceOf(ValidationError);
    await expect(users.create({ ...input, role_id: 99 })).rejects.toBeInstanceOf(InvalidReferenceError);
    await users.create(input);
    await expect(users.create(input)).rejects.toBeInstanceOf(DuplicateEmailError);
  });

  it('updates only the supplied fields', async () => {
    const created = await users.create(input);
    const before = await fixture.store.findUserById(created.id);

    const updated = await users.update(created.id, { name: 'The Doctor' });

    const after = await fixture.store.findUserById(created.id);
    expect(updated.name).toBe('The Doctor');
    expect(after?.email).toBe('who@example.com');
    expect(after?.role_id).toBe(2);
    expect(after?.password_hash).toBe(before?.password_hash);
  });

  it('re-hashes a new password', async () => {
    const created = await users.create(input);

    await users.update(created.id, { password: 'regenerate' });

    const stored = await fixture.store.findUserById(created.id);
    expect(await fixture.hasher.verify('regenerate', stored?.password_hash ?? '')).toBe(true);
    expect(await fixture.hasher.verify('tardis', stored?.password_hash ?? '')).toBe(false);
  });

  it('rejects a nonexistent role and leaves the record unchanged', async () => {
    const created = await users.create(input);
    const before = await fixture.store.findUserById(created.id);

    await expect(users.update(created.id, { role_id: 99, name: 'Changed' })).rejects.toBeInstanceOf(
      InvalidReferenceError
    );
    expect(await fixture.store.findUserById(created.id)).toEqual(before);
  });

  it('validates supplied fields on update', async () => {
    const created = await users.create(input);

    await expect(users.update(created.id, { email: 'nope' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports missing users as NotFound', async () => {
    await expect(users.get(12)).rejects.toEqual(new NotFoundError('User', 12));
    await expect(users.update(12, { name: 'X' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('deletes once, then reports NotFound', async () => {
    const created = await users.create(input);

    await expect(users.delete(created.id)).resolves.toBeUndefined();
    await expect(users.delete(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists doctors only', async () => {
    await users.create(input);
    await users.create({ ...input, email: 'pat@example.com', role_id: 3 });

    expect((await users.listDoctors()).map((user) => user.email)).toEqual(['who@example.com']);
  });
});

describe('RoleService', () => {
  let fixture: TestFixture;
  let roles: RoleService;

  beforeEach(() => {
    fixture = createFixture();
    roles = new RoleService(fixture.store);
  });

  it('adds a role with the next id', async () => {
    expect(await roles.create('  nurse ')).toEqual({ id: 4, name: 'nurse' });
    expect((await roles.list()).map((role) => role.name)).toEqual(['admin', 'doctor', 'patient', 'nurse']);
  });

  it('validates and de-duplicates names', async () => {
    await expect(roles.create('')).rejects.toBeInstanceOf(ValidationError);
    await expect(roles.create('patient')).rejects.toBeInstanceOf(DuplicateRoleError);
  });

  it('protects seeded roles', async () => {
    await expect(roles.delete(1)).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('refuses to delete a role an access policy still lists', async () => {
    const nurse = await roles.create('nurse');
    const gated = new RoleService(fixture.store, [{ name: 'ward', allowedRoles: new Set([nurse.id]) }]);

    await expect(gated.delete(nurse.id)).rejects.toThrow(
      new ForbiddenError(`Role ${nurse.id} is used by access policy 'ward'.`)
    );
    expect((await roles.list()).map((role) => role.id)).toContain(nurse.id);
  });

  it('refuses to delete a role in use', async () => {
    const nurse = await roles.create('nurse');
    await fixture.store.createUser({ name: 'N', email: 'n@example.com', password_hash: 'h', role_id: nurse.id });

    await expect(roles.delete(nurse.id)).rejects.toBeInstanceOf(RoleInUseError);
  });

  it('deletes an unused role and then reports NotFound', async () => {
    const nurse = await roles.create('nurse');

    await roles.delete(nurse.id);
    await expect(roles.delete(nurse.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
