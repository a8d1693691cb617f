import "dotenv/config";
import { buildApiApp } from "./app.js";
import { loadApiConfigWithSecrets } from "./config/index.js";
import {
  CachedSecretProvider,
  ChainedSecretProvider,
  DirectorySecretProvider,
  EnvSecretProvider,
  type SecretProvider
} from "./config/secrets.js";

const providers: SecretProvider[] = [];
if (process.env.SECRETS_DIR) {
  providers.push(new DirectorySecretProvider(process.env.SECRETS_DIR));
}
providers.push(new EnvSecretProvider(process.env));

const config = await loadApiConfigWithSecrets(
  process.env,
  new CachedSecretProvider(new ChainedSecretProvider(providers))
);
const { app } = await buildApiApp({ config });

await app.listen({ host: config.host, port: config.port });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    app.log.info({ signal }, "Shutting down");
    void app.close().finally(() => {
      process.exit(0);
    });
  });
}
