import { createHash, timingSafeEqual } from 'node:crypto';
import { type FastifyReply, type FastifyRequest } from 'fastify';
import { ErrorCode } from '@botm/shared';

export interface BasicCredentials {
  username: string;
  password: string;
}

export const BASIC_REALM = 'generate';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) return null;
  const decoded = Buffer.from(header.slice(6).trim(), 'base64').toString('utf-8');
  const sep = decoded.indexOf(':');
  if (sep === -1) return null;
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

export function createBasicAuth(expected: BasicCredentials) {
  return async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    const given = parseBasicAuth(request.headers.authorization);
    // Both comparisons always run
    const userOk = safeEqual(given?.username ?? '', expected.username);
    const passOk = safeEqual(given?.password ?? '', expected.password);
    if (given && userOk && passOk) return;

    return reply
      .status(401)
      .header('WWW-Authenticate', `Basic realm="${BASIC_REALM}"`)
      .send({ code: ErrorCode.UNAUTHORIZED, message: 'Missing or invalid credentials' });
  };
}
