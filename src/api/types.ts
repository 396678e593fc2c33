// src/api/types.ts

import type { HttpCore } from '../core/http/HttpCore';
import type { Logger } from '../observability/Logger';
import type { OperationTable } from './operations';

export interface ApiDeps {
  http: HttpCore;
  routes: OperationTable;
  logger: Logger;
}

export interface CallOptions {
  signal?: AbortSignal;
}
