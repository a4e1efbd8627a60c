import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

type PreHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

/**
 * Bearer token extracted from the Authorization header, if any
 */
export function bearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) {
    return null;
  }
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1] ?? null;
}

export function tokensMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

// Operator token verification middleware factory
export function requireOperatorToken(expected: string): PreHandler {
  return async function (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const token = bearerToken(request);

    if (!token) {
      return reply.code(401).send({
        success: false,
        error: 'Unauthorized',
        message: 'No authorization header provided',
      });
    }

    if (!tokensMatch(token, expected)) {
      return reply.code(401).send({
        success: false,
        error: 'Unauthorized',
        message: 'Invalid operator token',
      });
    }
    return undefined;
  };
}
