/**
 * Access Control Middleware
 *
 * Guards a route with a PolicyEngine decision. Attribute resolvers are
 * supplied by the host service, which knows where the subject comes from
 * (session, token claims) and how to load the resource.
 *
 * Responses on deny follow the `{ error, error_description }` error body shape.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { createLogger, toError } from '@claimshield/lib-core';
import type { PolicyEngine } from '../engine';
import type {
  AccessDecision,
  RequestContext,
  ResourceAttributes,
  SubjectAttributes,
} from '../types';

const log = createLogger().module('ACCESS-MIDDLEWARE');

export type AccessVariables = {
  accessDecision: AccessDecision;
};

export type AccessEnv = {
  Variables: AccessVariables;
};

type Resolver<T> = (c: Context<AccessEnv>) => T | Promise<T>;

export interface RequireAccessOptions {
  engine: PolicyEngine;

  /** Permission string evaluated for the request, e.g. 'claim:view' */
  action: string | Resolver<string>;

  /** Subject attributes, including `roles` */
  subject: Resolver<SubjectAttributes>;

  /** Resource attributes (default: none) */
  resource?: Resolver<ResourceAttributes>;

  /** Request context; the engine synthesizes one from the clock when omitted */
  context?: Resolver<RequestContext | undefined>;
}

function deny(c: Context<AccessEnv>, description: string): Response {
  return c.json(
    {
      error: 'access_denied',
      error_description: description,
    },
    403
  );
}

/**
 * Require an allow decision before the route handler runs
 *
 * @example
 * app.get('/claims/:id',
 *   requireAccess({
 *     engine,
 *     action: 'claim:view',
 *     subject: (c) => loadSubject(c),
 *     resource: (c) => loadClaim(c.req.param('id')),
 *   }),
 *   getClaimHandler
 * )
 */
export function requireAccess(options: RequireAccessOptions): MiddlewareHandler<AccessEnv> {
  return async (c, next) => {
    let decision: AccessDecision;
    try {
      const action = typeof options.action === 'string' ? options.action : await options.action(c);
      const subject = await options.subject(c);
      const resource = options.resource ? await options.resource(c) : {};
      const context = options.context ? await options.context(c) : undefined;

      decision = options.engine.decide(subject, resource, action, context);
    } catch (error) {
      log.error('Failed to resolve access request', { path: c.req.path }, toError(error));
      return deny(c, 'Access request could not be evaluated.');
    }

    if (!decision.allowed) {
      return deny(c, decision.reason);
    }

    c.set('accessDecision', decision);
    await next();
  };
}
