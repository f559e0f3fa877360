import { Hono } from 'hono';
import type { OperatorResolver } from '../resolver/resolver.js';
import type { DefinitionStore } from '../store/types.js';
import type { AuditLog } from '../audit/log.js';
import { isResolutionError, type ResolutionErrorCode } from '../errors.js';

interface OperatorApiDeps {
  resolver: OperatorResolver;
  store: DefinitionStore;
  audit?: AuditLog;
}

const ERROR_STATUS: Record<ResolutionErrorCode, 404 | 422> = {
  NOT_FOUND: 404,
  MISSING_PARENT: 422,
  CIRCULAR_DEPENDENCY: 422,
  VALIDATION_FAILED: 422,
};

export function createOperatorApi(deps: OperatorApiDeps): Hono {
  const app = new Hono();

  app.onError((err, c) => {
    if (isResolutionError(err)) {
      return c.json({ ok: false, error: err.toJSON() }, ERROR_STATUS[err.code]);
    }
    console.error('Unhandled error in operator API:', err);
    return c.json({ ok: false, error: { code: 'INTERNAL', message: 'Internal server error' } }, 500);
  });

  // GET /operators
  app.get('/operators', (c) => c.json({ ok: true, operators: deps.store.list() }));

  // GET /operators/:name/resolve?section=shell
  app.get('/operators/:name/resolve', (c) => {
    const name = c.req.param('name');
    const section = c.req.query('section') || undefined;
    const config = deps.resolver.resolve(name, section);
    return c.json({ ok: true, config });
  });

  // GET /operators/:name/validate
  app.get('/operators/:name/validate', (c) => {
    const report = deps.resolver.validate(c.req.param('name'));
    return c.json({ ok: true, report });
  });

  // GET /validate: every stored operator
  app.get('/validate', (c) => {
    const reports = deps.resolver.validateAll();
    return c.json({ ok: true, valid: reports.every((r) => r.valid), reports });
  });

  // GET /audit
  app.get('/audit', (c) => {
    if (!deps.audit) {
      return c.json({ ok: false, error: { code: 'AUDIT_DISABLED', message: 'Audit logging is not enabled' } }, 404);
    }

    const limit = Number(c.req.query('limit'));
    const entries = deps.audit.getEntries({
      operator: c.req.query('operator'),
      event: c.req.query('event'),
      after: c.req.query('after'),
      before: c.req.query('before'),
      limit: Number.isInteger(limit) && limit > 0 ? limit : undefined,
    });
    return c.json({ ok: true, entries });
  });

  return app;
}
