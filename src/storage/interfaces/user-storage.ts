import type { User, CreateUserInput } from '../../types/user.js';

/**
 * Local user directory
 *
 * Account management lives outside this service; it only needs lookups
 * and account creation for registration.
 */
export interface IUserDirectory {
  findById(id: string): Promise<User | null>;

  findByEmail(email: string): Promise<User | null>;

  findByWebId(webId: string): Promise<User | null>;

  create(input: CreateUserInput): Promise<User>;
}
