// src/api/BaseApi.ts

import type { z } from 'zod';
import type { ApiDeps, CallOptions } from './types';
import type { OperationName } from './operations';
import { InvalidRequestError } from '../utils/errors';

export abstract class BaseApi {
  constructor(protected deps: ApiDeps) {}

  /**
   * Check an outgoing body against its schema before any I/O.
   *
   * @throws {InvalidRequestError} The body does not match
   */
  protected buildBody<S extends z.ZodTypeAny>(
    operation: OperationName,
    schema: S,
    value: z.input<S>
  ): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidRequestError(`Invalid ${operation} request`, {
        operation,
        issues: result.error.issues.map(
          (issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`
        ),
      });
    }
    return result.data;
  }

  /**
   * Run a named operation through the request executor.
   */
  protected async call<S extends z.ZodTypeAny>(
    operation: OperationName,
    name: string,
    schema: S,
    body?: unknown,
    opts: CallOptions & { query?: Record<string, string> } = {}
  ): Promise<z.output<S>> {
    const route = this.deps.routes[operation];
    this.deps.logger.debug('DEP operation', { operation, depName: name });

    return this.deps.http.execute(name, route, schema, body, {
      query: opts.query,
      signal: opts.signal,
    });
  }
}
