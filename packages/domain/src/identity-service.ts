import { type User } from './user';
import { type CredentialHasher, type UserRepository } from './ports';
import { DomainError } from './errors';
import { deleteAtomically, type CascadeReport, type DeletionDeps } from './cascade';
import { DisplayNameSchema, LoginIdSchema, isId, parseInput } from './validation';

export interface IdentityServiceDeps<Tx> extends DeletionDeps<Tx> {
  userRepo: UserRepository<Tx>;
  hasher: CredentialHasher;
  generateId: () => string;
}

export class IdentityService<Tx> {
  constructor(private readonly deps: IdentityServiceDeps<Tx>) {}

  /** `credentialHash` is produced outside the core and stored as given. */
  async createUser(loginId: string, credentialHash: string, displayName: string): Promise<User> {
    const normalizedLogin = parseInput(LoginIdSchema, loginId);
    const name = parseInput(DisplayNameSchema, displayName);
    if (credentialHash.length === 0) {
      throw new DomainError('INVALID_INPUT', 'Credential hash is required', { field: 'credentialHash' });
    }

    return this.deps.withTransaction(async (tx) =>
      this.deps.userRepo.create(tx, {
        id: this.deps.generateId(),
        loginId: normalizedLogin,
        credentialHash,
        displayName: name,
      }),
    );
  }

  async registerUser(loginId: string, plaintext: string, displayName: string): Promise<User> {
    if (plaintext.length === 0) {
      throw new DomainError('INVALID_INPUT', 'Credential is required', { field: 'credential' });
    }
    const credentialHash = await this.deps.hasher.hash(plaintext);
    return this.createUser(loginId, credentialHash, displayName);
  }

  async findByLoginId(loginId: string): Promise<User | null> {
    const normalizedLogin = parseInput(LoginIdSchema, loginId);
    return this.deps.withTransaction(async (tx) => this.deps.userRepo.findByLoginId(tx, normalizedLogin));
  }

  async getUser(userId: string): Promise<User> {
    return this.deps.withTransaction(async (tx) => {
      const user = isId(userId) ? await this.deps.userRepo.findById(tx, userId) : null;
      if (!user) {
        throw new DomainError('USER_NOT_FOUND', 'User not found', { userId });
      }
      return user;
    });
  }

  /** Unknown login ids verify as `false`, same as a wrong credential. */
  async verifyCredential(loginId: string, plaintext: string): Promise<boolean> {
    const user = await this.findByLoginId(loginId);
    if (!user) return false;
    return this.deps.hasher.verify(plaintext, user.credentialHash);
  }

  async updateProfile(userId: string, displayName: string): Promise<User> {
    const name = parseInput(DisplayNameSchema, displayName);
    return this.deps.withTransaction(async (tx) => {
      const user = isId(userId) ? await this.deps.userRepo.updateDisplayName(tx, userId, name) : null;
      if (!user) {
        throw new DomainError('USER_NOT_FOUND', 'User not found', { userId });
      }
      return user;
    });
  }

  /**
   * Removes the user with their memberships, owned items, authored messages and
   * reactions. Replies by others to removed messages become top-level.
   */
  async deleteUser(userId: string): Promise<CascadeReport> {
    return deleteAtomically(this.deps, { kind: 'user', id: userId }, async (tx) => {
      const user = isId(userId) ? await this.deps.userRepo.findById(tx, userId) : null;
      if (!user) {
        throw new DomainError('USER_NOT_FOUND', 'User not found', { userId });
      }
    });
  }
}
