// src/api/account/AccountApi.ts

import { BaseApi } from '../BaseApi';
import type { CallOptions } from '../types';
import { AccountDetailSchema, type AccountDetail } from './types';

export class AccountApi extends BaseApi {
  async account(name: string, opts?: CallOptions): Promise<AccountDetail> {
    return this.call('account', name, AccountDetailSchema, undefined, opts);
  }
}
