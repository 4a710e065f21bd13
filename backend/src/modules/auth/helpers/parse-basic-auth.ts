/**
 * src/modules/auth/helpers/parse-basic-auth.ts
 *
 * WHY:
 * - The HTTP channel carries credentials in `Authorization: Basic base64(login:password)`.
 *
 * RULES:
 * - Pure function. No I/O.
 * - Returns null for a missing or non-Basic header; the password may contain ':'.
 */

export type BasicCredentials = {
  login: string;
  password: string;
};

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const match = /^Basic\s+(.+)$/i.exec(header.trim());
  const encoded = match?.[1];
  if (!encoded) return null;

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep < 0) return null;

  return {
    login: decoded.slice(0, sep),
    password: decoded.slice(sep + 1),
  };
}
