/**
 * Local user account
 */
export interface User {
  id: string;
  email: string;
  webId: string;
  name?: string;
  createdAt: Date;
}

export interface CreateUserInput {
  email: string;
  name?: string;
  /**
   * Generated from the base URL when absent
   */
  webId?: string;
}
