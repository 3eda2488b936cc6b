import { type FastifyRequest } from 'fastify';

/** Origin the client used to reach us, with a trailing slash; emailed links hang off it. */
export function baseUrlOf(request: FastifyRequest): string {
  return `${request.protocol}://${request.hostname}/`;
}
