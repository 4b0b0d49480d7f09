import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

function extractBearerToken(authorizationHeader: string): string {
  if (!authorizationHeader) return '';
  const parts = authorizationHeader.split(' ');
  if (parts.length !== 2) return '';
  const [scheme, token] = parts;
  if (!/^Bearer$/i.test(scheme)) return '';
  return token.trim();
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(provided).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

export function extractAuthToken(request: FastifyRequest): string {
  const xApiToken = getHeaderValue(request.headers['x-api-token']).trim();
  if (xApiToken) return xApiToken;

  const authHeader = getHeaderValue(request.headers.authorization);
  return extractBearerToken(authHeader);
}

/**
 * Rejects the request with 401 when auth is enforced and the token is missing
 * or does not match API_TOKEN. Returns false once the reply has been sent.
 */
export function requireAuthIfEnabled(request: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return true;

  const token = extractAuthToken(request);
  if (!token) {
    reply.code(401).send({
      error: 'unauthorized',
      message: 'Missing API token',
    });
    return false;
  }

  if (!env.API_TOKEN || !tokensMatch(token, env.API_TOKEN)) {
    reply.code(401).send({
      error: 'unauthorized',
      message: 'Invalid API token',
    });
    return false;
  }

  return true;
}
