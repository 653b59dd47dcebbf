import type { SecretResolver } from '../ports/secret-resolver.js';

export class EnvSecretResolver implements SecretResolver {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  resolve(name: string): string | undefined {
    const value = this.env[name];
    return value ? value : undefined;
  }
}
