import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { LATENCY_BUDGETS, checkLatencyBudget } from '@pagecite/shared';
import type { Services } from '../container';
import { abortOnDisconnect, toErrorResponse } from './reply';

export const answerRoutes: FastifyPluginAsync<{ services: Services }> = async (fastify, { services }) => {
  /**
   * POST /api/v1/answer
   * Retrieval + grounded generation, returned as one JSON body.
   *
   * A generation failure is not an HTTP error: the partial answer comes
   * back with `incomplete: true`. Closing the connection aborts retrieval
   * and generation.
   */
  fastify.post('/', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;
    const signal = abortOnDisconnect(reply.raw, 'answer');

    const result = await services.answers.answer(request.body, { signal });

    const latency = Date.now() - startTime;
    const budget = checkLatencyBudget(latency, LATENCY_BUDGETS.TOTAL, 'answer');
    if (budget.exceeded) {
      request.log.warn({ requestId, violation: budget.violation }, 'Answer exceeded latency budget');
    }

    request.log.info(
      { requestId, latency, sources: result.sources.length, incomplete: result.incomplete },
      'Answer processed'
    );

    return { requestId, ...result, latency };
  });

  /**
   * POST /api/v1/answer/stream
   * Server-sent events:
   *   sources  retrieved passages, once, before generation
   *   delta    { text } per generated fragment
   *   done     { answer, citations, incomplete, error? }
   *
   * Failures before `sources` are ordinary JSON errors. Closing the
   * connection aborts generation.
   */
  fastify.post('/stream', async (request, reply) => {
    const requestId = request.id;

    // Reject bad input before committing to an event stream.
    services.engine.parse(request.body);

    const signal = abortOnDisconnect(reply.raw, 'answer stream');

    let streaming = false;

    try {
      const result = await services.answers.answer(request.body, {
        signal,
        onSources: (sources) => {
          openEventStream(reply);
          streaming = true;
          writeEvent(reply, 'sources', { requestId, sources });
        },
        onDelta: (text) => writeEvent(reply, 'delta', { text }),
      });

      if (!streaming) {
        openEventStream(reply);
      }
      writeEvent(reply, 'done', {
        answer: result.answer,
        citations: result.citations,
        incomplete: result.incomplete,
        ...(result.error && { error: result.error }),
      });
      reply.raw.end();

      request.log.info({ requestId, incomplete: result.incomplete }, 'Answer stream finished');
    } catch (error) {
      if (!streaming) {
        throw error;
      }
      const { body } = toErrorResponse(error, requestId);
      request.log.error({ requestId, code: body.code }, 'Answer stream failed');
      writeEvent(reply, 'error', body);
      reply.raw.end();
    }
  });
};

function openEventStream(reply: FastifyReply): void {
  reply.hijack();
  reply.raw.writeHead(200, {
    ...reply.getHeaders(),
    'content-type': 'text/event-stream; charset=utf-8',
    'cache-control': 'no-cache',
    connection: 'keep-alive',
  });
}

function writeEvent(reply: FastifyReply, event: string, data: unknown): void {
  if (!reply.raw.writableEnded) {
    reply.raw.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
  }
}
