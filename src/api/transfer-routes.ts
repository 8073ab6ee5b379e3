import { FastifyInstance } from 'fastify';
import { SessionLifecycle } from '../session/session-lifecycle';
import { bodyValidator, sendFailure, sendOk, verifyAdmin } from './envelope';
import { presentTransfer } from './presenters';

interface AcceptTransferBody {
  accepted_by: string;
}

const validateAccept = bodyValidator<AcceptTransferBody>({
  type: 'object',
  required: ['accepted_by'],
  properties: {
    accepted_by: { type: 'string', minLength: 1 },
  },
});

export function registerTransferRoutes(
  app: FastifyInstance,
  deps: { lifecycle: SessionLifecycle; adminApiKey: string },
): void {
  app.post<{ Params: { transferId: string } }>(
    '/api/transfers/:transferId/accept',
    { preHandler: verifyAdmin(deps.adminApiKey) },
    async (req, reply) => {
      const parsed = validateAccept(req.body);
      if ('error' in parsed) return sendFailure(reply, parsed.error);

      const accepted = await deps.lifecycle.acceptTransfer(req.params.transferId, parsed.value.accepted_by);
      if (!accepted) {
        return sendFailure(reply, {
          errorCode: 'TRANSFER_NOT_FOUND',
          errorMessage: `Transfer ${req.params.transferId} not found or already decided`,
        });
      }
      return sendOk(reply, 'Transfer accepted', presentTransfer(accepted));
    },
  );
}
