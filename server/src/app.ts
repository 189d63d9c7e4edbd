import express from 'express';
import cors from 'cors';
import { createAuthenticator, type Authenticator } from './auth/authenticate.js';
import { LoginLinkService } from './auth/loginLinks.js';
import { SessionService } from './auth/sessions.js';
import { createAuthRouter } from './routes/auth.js';
import { createInfradminRouter } from './routes/infradmin.js';
import { createTournamentsRouter } from './routes/tournaments.js';
import { createUsersRouter } from './routes/users.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { Stores, UserStore } from './stores/types.js';

export interface AppServices {
  users: UserStore;
  sessions: SessionService;
  loginLinks: LoginLinkService;
  authenticator: Authenticator;
}

export interface ServiceOptions {
  secret?: string;
  sessionLifetimeSeconds?: number;
  loginLinkLifetimeSeconds?: number;
  clock?: () => Date;
}

export function createServices(stores: Stores, options: ServiceOptions = {}): AppServices {
  const sessions = new SessionService({
    store: stores.sessions,
    lifetimeSeconds: options.sessionLifetimeSeconds,
    secret: options.secret,
    clock: options.clock,
  });
  const loginLinks = new LoginLinkService({
    tokens: stores.loginTokens,
    users: stores.users,
    lifetimeSeconds: options.loginLinkLifetimeSeconds,
    secret: options.secret,
    clock: options.clock,
  });
  const authenticator = createAuthenticator({ users: stores.users, sessions });

  return { users: stores.users, sessions, loginLinks, authenticator };
}

export interface AppOptions {
  corsOrigin?: string;
}

export function createApp(services: AppServices, options: AppOptions = {}) {
  const app = express();

  // Cookies carry credentials, so CORS is only opened to an explicit origin.
  app.use(cors(options.corsOrigin ? { origin: options.corsOrigin, credentials: true } : undefined));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/auth', createAuthRouter(services));
  app.use('/users', createUsersRouter(services));
  app.use('/infradmin', createInfradminRouter(services));
  app.use('/tournaments', createTournamentsRouter(services));

  app.use(errorHandler);

  return app;
}
