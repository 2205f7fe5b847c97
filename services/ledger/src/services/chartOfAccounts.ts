import { z } from 'zod';
import { DocumentStore } from '@ledgerline/database';
import { Account, AccountCode, AccountType, Clock, PostingSide, systemClock } from '@ledgerline/shared-types';
import {
  AccountInUseError,
  AccountInput,
  DuplicateCodeError,
  Mutex,
  NotFoundError,
  ValidationError,
  accountInputSchema,
  createLogger,
  parseWith,
} from '@ledgerline/shared-utils';
import defaultUkChart from '../../data/defaultUkChart.json';

const logger = createLogger('ledger-service');

export interface CreateAccountOptions {
  normalSide?: PostingSide;
  parentCode?: AccountCode;
}

export interface AccountChanges {
  name?: string;
  parentCode?: AccountCode | null;
}

export function defaultNormalSide(type: AccountType): PostingSide {
  return type === AccountType.ASSET || type === AccountType.EXPENSE ? PostingSide.DEBIT : PostingSide.CREDIT;
}

const chartSchema = z.array(accountInputSchema);

/**
 * Hierarchical chart of accounts. Accounts become immutable once a posted transaction
 * references them; deletion leaves a tombstone rather than removing the record.
 *
 * Changes run under `lock`, which must be the lock the ledger posts under so that a posting
 * cannot land on an account between the `referenced` check and the write.
 */
export class AccountPlan {
  readonly lock: Mutex;

  constructor(
    private readonly store: DocumentStore,
    private readonly clock: Clock = systemClock,
    lock: Mutex = new Mutex()
  ) {
    this.lock = lock;
  }

  async create(
    code: AccountCode,
    name: string,
    type: AccountType,
    options: CreateAccountOptions = {}
  ): Promise<Account> {
    const input = parseWith(accountInputSchema, { code, name, type, ...options }, 'account');
    return this.lock.runExclusive(() => this.insert(input));
  }

  private async insert(input: AccountInput): Promise<Account> {
    if (await this.find(input.code)) {
      throw new DuplicateCodeError(input.code);
    }
    if (input.parentCode !== undefined) {
      if (input.parentCode === input.code) {
        throw new ValidationError('An account cannot be its own parent', { code: input.code });
      }
      if (!(await this.find(input.parentCode))) {
        throw new ValidationError(`Unknown parent account: ${input.parentCode}`, { parentCode: input.parentCode });
      }
    }

    const account: Account = {
      code: input.code,
      name: input.name,
      type: input.type,
      normalSide: input.normalSide ?? defaultNormalSide(input.type),
      parentCode: input.parentCode,
      active: true,
      referenced: false,
      createdAt: this.clock.now().toISOString(),
    };
    await this.store.save('account', account.code, account);

    logger.info('Account created', { code: account.code, type: account.type });
    return account;
  }

  async find(code: AccountCode): Promise<Account | undefined> {
    const account = await this.store.load('account', code);
    return account && !account.deletedAt ? account : undefined;
  }

  async get(code: AccountCode): Promise<Account> {
    const account = await this.find(code);
    if (!account) {
      throw new NotFoundError('Account', code);
    }
    return account;
  }

  async list(): Promise<Account[]> {
    const accounts = await this.store.list('account');
    return accounts
      .filter((account) => !account.deletedAt)
      .sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
  }

  async children(code: AccountCode): Promise<Account[]> {
    await this.get(code);
    return (await this.list()).filter((account) => account.parentCode === code);
  }

  async descendants(code: AccountCode): Promise<Account[]> {
    await this.get(code);
    const accounts = await this.list();
    const result: Account[] = [];
    const queue = [code];
    while (queue.length > 0) {
      const parent = queue.shift();
      for (const account of accounts) {
        if (account.parentCode === parent) {
          result.push(account);
          queue.push(account.code);
        }
      }
    }
    return result;
  }

  delete(code: AccountCode): Promise<void> {
    return this.lock.runExclusive(() => this.tombstone(code));
  }

  private async tombstone(code: AccountCode): Promise<void> {
    const account = await this.get(code);
    if (account.referenced) {
      throw new AccountInUseError(code, 'referenced by posted transactions');
    }
    if ((await this.children(code)).length > 0) {
      throw new AccountInUseError(code, 'has child accounts');
    }

    await this.store.save('account', code, { ...account, active: false, deletedAt: this.clock.now().toISOString() });
    logger.info('Account deleted', { code });
  }

  update(code: AccountCode, changes: AccountChanges): Promise<Account> {
    return this.lock.runExclusive(() => this.revise(code, changes));
  }

  private async revise(code: AccountCode, changes: AccountChanges): Promise<Account> {
    const account = await this.get(code);
    if (account.referenced) {
      throw new AccountInUseError(code, 'referenced accounts are immutable');
    }

    const next: Account = { ...account, updatedAt: this.clock.now().toISOString() };
    if (changes.name !== undefined) {
      next.name = parseWith(accountInputSchema.shape.name, changes.name, 'account name');
    }
    if (changes.parentCode === null) {
      delete next.parentCode;
    } else if (changes.parentCode !== undefined) {
      await this.assertValidParent(code, changes.parentCode);
      next.parentCode = changes.parentCode;
    }

    await this.store.save('account', code, next);
    return next;
  }

  /** Inactive accounts stay on the chart and in history but accept no new postings. */
  deactivate(code: AccountCode): Promise<Account> {
    return this.lock.runExclusive(async () => {
      const account = await this.get(code);
      if (!account.active) {
        return account;
      }
      const next: Account = { ...account, active: false, updatedAt: this.clock.now().toISOString() };
      await this.store.save('account', code, next);
      logger.info('Account deactivated', { code });
      return next;
    });
  }

  async markReferenced(codes: Iterable<AccountCode>): Promise<void> {
    for (const code of new Set(codes)) {
      const account = await this.find(code);
      if (account && !account.referenced) {
        await this.store.save('account', code, { ...account, referenced: true });
      }
    }
  }

  /** Installs the default UK chart when the plan is empty; returns the number of accounts created. */
  async seedDefaultChart(): Promise<number> {
    if ((await this.list()).length > 0) {
      logger.info('Chart of accounts already initialized');
      return 0;
    }

    const entries = parseWith(chartSchema, defaultUkChart, 'default chart of accounts');
    for (const entry of entries) {
      await this.create(entry.code, entry.name, entry.type, {
        normalSide: entry.normalSide,
        parentCode: entry.parentCode,
      });
    }

    logger.info('Chart of accounts initialized', { accountCount: entries.length });
    return entries.length;
  }

  private async assertValidParent(code: AccountCode, parentCode: AccountCode): Promise<void> {
    await this.get(parentCode).catch((error: unknown) => {
      if (error instanceof NotFoundError) {
        throw new ValidationError(`Unknown parent account: ${parentCode}`, { parentCode });
      }
      throw error;
    });
    if (parentCode === code || (await this.descendants(code)).some((account) => account.code === parentCode)) {
      throw new ValidationError('Account hierarchy cannot contain cycles', { code, parentCode });
    }
  }
}
