import type { User, CreateUserInput } from '../../types/user.js';
import type { IUserDirectory } from '../interfaces/user-storage.js';
import { AuthError } from '../../errors/index.js';
import { generateId } from '../../crypto/index.js';

/**
 * In-memory user directory
 *
 * WebIDs default to `${baseUrl}/users/<id>#me`.
 */
export class MemoryUserDirectory implements IUserDirectory {
  private users = new Map<string, User>();

  constructor(private readonly baseUrl: string = 'http://localhost:3000') {}

  async findById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return this.find((user) => user.email.toLowerCase() === wanted);
  }

  async findByWebId(webId: string): Promise<User | null> {
    return this.find((user) => user.webId === webId);
  }

  async create(input: CreateUserInput): Promise<User> {
    if (input.email === '') {
      throw AuthError.invalidRequest('Email is required');
    }
    if (await this.findByEmail(input.email)) {
      throw AuthError.invalidRequest(`User with email ${input.email} already exists`);
    }

    const id = generateId();
    const user: User = {
      id,
      email: input.email,
      webId: input.webId ?? `${this.baseUrl}/users/${encodeURIComponent(id)}#me`,
      name: input.name,
      createdAt: new Date(),
    };

    this.users.set(id, user);
    return { ...user };
  }

  private find(predicate: (user: User) => boolean): User | null {
    for (const user of this.users.values()) {
      if (predicate(user)) {
        return { ...user };
      }
    }
    return null;
  }
}
