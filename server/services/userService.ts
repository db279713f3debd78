/**
 * User Service - registration, lookup, soft-deletion and login
 *
 * Users are never removed. Soft-deleting clears email and password hash,
 * keeps the name so old invitations and games still resolve, and blocks
 * every later login and token use.
 */

import type { User } from "@shared/schema";
import type { AuthService } from "../auth/service";
import type { IStorage, UserQuery } from "../storage/types";
import { DuplicateIdentityError } from "../storage/errors";
import logger from "../logger";
import { failure, success, type ServiceResult } from "./types";

export interface CreateUserInput {
  name: string;
  email: string;
  password: string;
}

export class UserService {
  constructor(
    private readonly storage: IStorage,
    private readonly auth: AuthService
  ) {}

  /**
   * Uniqueness is left to the store's constraints; there is no pre-check
   * that a concurrent signup could slip past.
   */
  async create(input: CreateUserInput): Promise<ServiceResult<User>> {
    const passwordHash = await this.auth.hashPassword(input.password);
    try {
      const user = await this.storage.createUser({
        name: input.name,
        email: input.email,
        passwordHash,
      });
      logger.info("User created", { userId: user.id, name: user.name });
      return success(user);
    } catch (error) {
      if (error instanceof DuplicateIdentityError) {
        return failure(400, "DUPLICATE_USER", error.message);
      }
      throw error;
    }
  }

  get(id: number): Promise<User | undefined> {
    return this.storage.getUser(id);
  }

  list(query: UserQuery): Promise<User[]> {
    return this.storage.listUsers(query);
  }

  async softDelete(id: number): Promise<boolean> {
    const deleted = await this.storage.softDeleteUser(id);
    if (deleted) logger.info("User soft-deleted", { userId: id });
    return deleted;
  }

  /** Null for an unknown name, a wrong password or a deleted user alike. */
  async login(name: string, password: string): Promise<string | null> {
    const user = await this.storage.getUserByName(name);
    if (!user || user.deleted) {
      await this.auth.verifyPassword(password, null);
      return null;
    }
    if (!(await this.auth.verifyPassword(password, user.passwordHash))) return null;
    return this.auth.issueToken({ userId: user.id, userName: user.name });
  }
}
