import type { CredentialPrefixes, Credentials } from './types.js';

export function deriveCredentials(id: number, prefixes: CredentialPrefixes): Credentials {
  return Object.freeze({
    username: `${prefixes.usernamePrefix}${id}`,
    password: `${prefixes.passwordPrefix}${id}`,
  });
}
