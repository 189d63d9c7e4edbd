import { createApp, createServices } from './app.js';
import { ensureInfrastructureAdmin } from './auth/infradmin.js';
import { parseEnv } from './env.js';
import { createSupabaseStores } from './stores/supabase.js';
import { createSupabase } from './supabase.js';

async function main() {
  const env = parseEnv(process.env);
  const stores = createSupabaseStores(createSupabase(env));

  await ensureInfrastructureAdmin(stores.users, env.INFRASTRUCTURE_ADMIN_PASSWORD);

  const services = createServices(stores, {
    secret: env.SECRET,
    sessionLifetimeSeconds: env.SESSION_TTL_SECONDS,
    loginLinkLifetimeSeconds: env.LOGIN_LINK_TTL_SECONDS,
  });
  const app = createApp(services, { corsOrigin: env.CORS_ORIGIN });

  app.listen(env.PORT, () => {
    console.log(`Server listening on port ${env.PORT}`);
  });
}

main().catch((error: unknown) => {
  console.error('Server failed to start', error);
  process.exit(1);
});
