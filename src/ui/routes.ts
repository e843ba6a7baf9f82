import express from 'express';
import { ApiResponse, Handlers } from './handlers';

export const CSRF_HEADER = 'x-csrf-token';

export const isValidCsrf = (expected: string, provided: unknown): boolean =>
  typeof provided === 'string' && provided.length > 0 && provided === expected;

const send = (res: express.Response, response: ApiResponse) => {
  res.status(response.status).json(response.body);
};

export const registerRoutes = (app: express.Application, handlers: Handlers, csrfToken: string) => {
  const json = express.json();
  const guard: express.RequestHandler = (req, res, next) => {
    if (!isValidCsrf(csrfToken, req.get(CSRF_HEADER))) {
      res.status(403).json({ error: 'Invalid CSRF token' });
      return;
    }
    next();
  };
  const respond =
    (produce: (req: express.Request) => ApiResponse | Promise<ApiResponse>): express.RequestHandler =>
    (req, res, next) => {
      Promise.resolve(produce(req))
        .then((response) => send(res, response))
        .catch(next);
    };

  app.get('/api/csrf', (_req, res) => {
    res.json({ header: CSRF_HEADER, token: csrfToken });
  });

  app.get('/api/rebalancing/status', respond(() => handlers.status()));
  app.get('/api/rebalancing/recommendations', respond(() => handlers.recommendations()));
  app.post('/api/rebalancing/trigger', json, guard, respond((req) => handlers.trigger(req.body)));
  app.post('/api/rebalancing/approve', json, guard, respond((req) => handlers.approve(req.body)));
  app.post('/api/rebalancing/reject', json, guard, respond((req) => handlers.reject(req.body)));
  app.post('/api/rebalancing/executed', guard, respond(() => handlers.markExecuted()));

  app.get('/api/rules', respond(() => handlers.listRules()));
  app.put('/api/rules', json, guard, respond((req) => handlers.updateRules(req.body)));
  app.get('/api/compliance', respond(() => handlers.compliance()));
  app.get('/api/compliance/history', respond((req) => handlers.complianceHistory({ limit: req.query.limit })));

  app.get('/api/chains', respond(() => handlers.chains()));
  app.get('/api/portfolio', respond(() => handlers.portfolio()));

  app.get('/api/configuration', respond(() => handlers.configuration()));
  app.put('/api/configuration', json, guard, respond((req) => handlers.updateConfiguration(req.body)));
};
