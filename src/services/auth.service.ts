/**
 * Authentication Service
 *
 * FLOW:
 * 1. Client registers or sends email + password
 * 2. We verify the password against the bcrypt hash in the store
 * 3. If correct, we issue a signed token for the user id
 * 4. Client sends the token with every request (Authorization header)
 * 5. The access middleware verifies it before protected routes run
 *
 * Collaborators are injected; nothing here is looked up globally.
 */

import type { CredentialStore } from '../models/credential-store';
import type { AuthResponse, LoginRequest, RegisterRequest, User } from '../types';
import { toUserPublic } from '../types';
import { InvalidCredentialsError, ValidationError } from '../utils/errors';
import type { PasswordHasher } from '../utils/hash.utils';
import { parseLogin, parsePositiveInt, parseRegistration, registrationErrors } from '../utils/validation.utils';
import type { Untrusted } from '../utils/validation.utils';
import type { TokenCodec } from './token.service';

export interface AuthServiceDeps {
  store: CredentialStore;
  hasher: PasswordHasher;
  tokens: TokenCodec;
  clock?: () => Date;
}

export class AuthService {
  private readonly store: CredentialStore;
  private readonly hasher: PasswordHasher;
  private readonly tokens: TokenCodec;
  private readonly clock: () => Date;

  constructor(deps: AuthServiceDeps) {
    this.store = deps.store;
    this.hasher = deps.hasher;
    this.tokens = deps.tokens;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Register a user and log them straight in.
   * Nothing is written unless every field (and the role) is valid.
   * @throws ValidationError
   * @throws DuplicateEmailError
   */
  async register(input: Untrusted<RegisterRequest>): Promise<AuthResponse> {
    const errors = registrationErrors(input);

    const roleId = parsePositiveInt(input.role_id);
    if (roleId !== null && !(await this.store.roleExists(roleId))) {
      errors.push({ field: 'role_id', message: 'Selected role does not exist' });
    }
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }

    const request = parseRegistration(input);
    const user = await this.store.createUser({
      name: request.name,
      email: request.email,
      password_hash: await this.hasher.hash(request.password),
      role_id: request.role_id,
    });

    return this.authenticate(user);
  }

  /**
   * Unknown email and wrong password fail with the same error, so the
   * response never tells which accounts exist.
   * @throws ValidationError email or password missing
   * @throws InvalidCredentialsError
   */
  async login(input: Untrusted<LoginRequest>): Promise<AuthResponse> {
    const credentials = parseLogin(input);

    const user = await this.store.findUserByEmail(credentials.email);
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const isPasswordValid = await this.hasher.verify(credentials.password, user.password_hash);
    if (!isPasswordValid) {
      throw new InvalidCredentialsError();
    }

    return this.authenticate(user);
  }

  private authenticate(user: User): AuthResponse {
    const { token, expiresAt } = this.tokens.issue(user.id, this.clock());
    return {
      token,
      expires_at: expiresAt,
      user: toUserPublic(user),
    };
  }
}
