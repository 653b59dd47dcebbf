/** Looks up secrets by name so configuration and job state only ever carry the name. */
export interface SecretResolver {
  resolve(name: string): string | undefined;
}
