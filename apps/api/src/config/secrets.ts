import { readFile } from "node:fs/promises";
import path from "node:path";

export interface SecretProvider {
  getSecret(name: string): Promise<string | undefined>;
}

export const SECRET_BACKED_SETTINGS = [
  { secretName: "azure-home-tenant-id", envName: "AZURE_HOME_TENANT_ID" },
  { secretName: "azure-client-id", envName: "AZURE_CLIENT_ID" },
  { secretName: "azure-client-secret", envName: "AZURE_CLIENT_SECRET" },
  { secretName: "required-scopes", envName: "REQUIRED_SCOPES" },
  { secretName: "multi-tenant-enabled", envName: "MULTI_TENANT_ENABLED" },
  { secretName: "enable-auto-tenant-discovery", envName: "ENABLE_AUTO_TENANT_DISCOVERY" }
] as const;

const SECRET_NAME_PATTERN = /^[a-z0-9][a-z0-9-]*$/u;

export function secretNameToEnvName(name: string) {
  return name.toUpperCase().replace(/-/gu, "_");
}

function assertSecretName(name: string) {
  if (!SECRET_NAME_PATTERN.test(name)) {
    throw new Error(`Invalid secret name: ${name}`);
  }
}

export class EnvSecretProvider implements SecretProvider {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  async getSecret(name: string): Promise<string | undefined> {
    assertSecretName(name);
    const value = this.env[secretNameToEnvName(name)];
    return value && value.length > 0 ? value : undefined;
  }
}

/**
 * Reads secrets mounted as one file per secret, the layout used by the
 * Secrets Store CSI driver and Docker secrets.
 */
export class DirectorySecretProvider implements SecretProvider {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  async getSecret(name: string): Promise<string | undefined> {
    assertSecretName(name);
    try {
      const value = (await readFile(path.join(this.directory, name), "utf8")).trim();
      return value.length > 0 ? value : undefined;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }
}

export class ChainedSecretProvider implements SecretProvider {
  private readonly providers: readonly SecretProvider[];

  constructor(providers: readonly SecretProvider[]) {
    this.providers = providers;
  }

  async getSecret(name: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      const value = await provider.getSecret(name);
      if (value !== undefined) {
        return value;
      }
    }

    return undefined;
  }
}

export class CachedSecretProvider implements SecretProvider {
  private readonly inner: SecretProvider;
  private readonly values = new Map<string, Promise<string | undefined>>();

  constructor(inner: SecretProvider) {
    this.inner = inner;
  }

  getSecret(name: string): Promise<string | undefined> {
    const cached = this.values.get(name);
    if (cached) {
      return cached;
    }

    const lookup = this.inner.getSecret(name);
    this.values.set(name, lookup);
    // A failed lookup is not remembered.
    void lookup.catch(() => this.values.delete(name));
    return lookup;
  }

  clear(name?: string) {
    if (name === undefined) {
      this.values.clear();
      return;
    }

    this.values.delete(name);
  }
}
