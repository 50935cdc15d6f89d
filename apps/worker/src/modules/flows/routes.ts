/**
 * Flow routes module.
 * GET /flows       : flows discoverable in the flow directory
 * GET /flows/:name : load and return one definition (404 lists alternatives)
 */
import type { FastifyInstance } from 'fastify';
import type { ApiResponse, AvailableFlow, FlowDefinition } from '@flowqa/shared';

const flowNameParamSchema = {
  params: {
    type: 'object',
    required: ['name'],
    properties: {
      name: { type: 'string', minLength: 1, maxLength: 200 },
    },
  },
} as const;

interface FlowListing {
  flowsDir: string;
  flows: AvailableFlow[];
}

export async function flowRoutes(app: FastifyInstance): Promise<void> {
  app.get<{ Reply: ApiResponse<FlowListing> }>('/flows', async (_request, reply) => {
    const flows = await app.flowLoader.listAvailable();
    return reply.send({ success: true, data: { flowsDir: app.flowLoader.flowsDir, flows } });
  });

  app.get<{ Params: { name: string }; Reply: ApiResponse<FlowDefinition> }>(
    '/flows/:name',
    { schema: flowNameParamSchema },
    async (request, reply) => {
      // Throws ProcessorError (NOT_FOUND, MALFORMED, INVALID_DEFINITION) for the error handler
      const flow = await app.flowLoader.loadByName(request.params.name);
      return reply.send({ success: true, data: flow });
    },
  );
}
