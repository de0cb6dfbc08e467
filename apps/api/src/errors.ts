import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ValidationDetails } from '@tasklane/core';
import { BODY_FIELD } from '@tasklane/core';

export const TASK_NOT_FOUND = 'Task not found';

export function sendInvalid(reply: FastifyReply, details: ValidationDetails): FastifyReply {
  return reply.code(422).send({ error: 'Validation Failed', details });
}

export function sendTaskNotFound(reply: FastifyReply): FastifyReply {
  return reply.code(404).send({ detail: TASK_NOT_FOUND });
}

/**
 * Body parsing failures (malformed JSON, empty JSON body) surface as 400 from
 * Fastify and are reported like any other validation failure. Anything
 * without a client status is logged and hidden behind a generic 500.
 */
export function handleError(err: FastifyError, req: FastifyRequest, reply: FastifyReply): FastifyReply {
  const status = err.statusCode ?? 500;

  if (status === 400) {
    return sendInvalid(reply, { [BODY_FIELD]: err.message });
  }
  if (status > 400 && status < 500) {
    return reply.code(status).send({ error: err.message });
  }

  req.log.error({ err }, 'request failed');
  return reply.code(500).send({ error: 'Internal Server Error' });
}
