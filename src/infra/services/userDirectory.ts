import type { OfficerAccount, OfficerAssignment, UserAccount, UserRepository } from '../../core/ports';

// Normalize ids and names for case-insensitive matching
const normalizeKey = (value: string): string => value.trim().toLowerCase();

// In-memory account lookup service
// Builds two Maps at startup: one for ids, one for display names
// Accounts are held by reference, so officer assignments are updated in place
export class UserDirectory implements UserRepository {
  // Map: normalized id => account
  private readonly byId = new Map<string, UserAccount>();
  // Map: normalized display name => account (first account wins on a clash)
  private readonly byName = new Map<string, UserAccount>();

  constructor(accounts: UserAccount[] = []) {
    accounts.forEach((account) => this.add(account));
  }

  add(account: UserAccount): void {
    const idKey = normalizeKey(account.person.id);
    if (this.byId.has(idKey)) {
      throw new Error(`Duplicate user id ${account.person.id}`);
    }
    this.byId.set(idKey, account);

    const nameKey = normalizeKey(account.person.name);
    if (!this.byName.has(nameKey)) {
      this.byName.set(nameKey, account);
    }
  }

  async findById(userId: string): Promise<UserAccount | null> {
    return this.byId.get(normalizeKey(userId)) ?? null;
  }

  // [...Map.values()] converts Map values iterator to array
  async list(): Promise<UserAccount[]> {
    return [...this.byId.values()];
  }

  async listOfficers(): Promise<OfficerAccount[]> {
    const officers: OfficerAccount[] = [];
    for (const account of this.byId.values()) {
      if (account.role === 'officer') {
        officers.push(account);
      }
    }
    return officers;
  }

  async resolve(idOrName: string): Promise<UserAccount | null> {
    const key = normalizeKey(idOrName);
    return this.byId.get(key) ?? this.byName.get(key) ?? null;
  }

  async updateAssignment(officerId: string, patch: Partial<OfficerAssignment>): Promise<OfficerAccount> {
    const account = this.byId.get(normalizeKey(officerId));
    if (!account || account.role !== 'officer') {
      throw new Error(`Officer ${officerId} not found`);
    }
    Object.assign(account.assignment, patch);
    return account;
  }
}
