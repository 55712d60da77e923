import { Router } from 'express';
import { validatePublishRequest } from '@mqtt-dashboard/shared';
import type { BridgeCommands } from '../commands.js';
import type { BrokerState } from '../state.js';
import { ApiError, asyncRoute } from '../errors.js';
import { requireBroker } from './guards.js';

export function messagesRouter(state: BrokerState, commands: Pick<BridgeCommands, 'publish'>): Router {
  const router = Router();

  router.post(
    '/publish',
    asyncRoute(async (req, res) => {
      requireBroker(state);
      const checked = validatePublishRequest(req.body);
      if (!checked.ok) throw new ApiError(400, checked.code, checked.error);

      const outcome = await commands.publish(checked.value);
      if (outcome.success) {
        res.json({ success: true, message: 'Message published successfully', details: checked.value });
        return;
      }
      switch (outcome.code) {
        case 'broker_disconnected':
          throw new ApiError(503, 'broker_disconnected', 'Not connected to MQTT broker');
        case 'bridge_timeout':
        case 'bridge_unavailable':
          throw new ApiError(500, 'publish_error', `Error publishing message: ${outcome.error ?? outcome.code}`);
        default:
          throw new ApiError(500, 'publish_failed', 'Failed to publish message');
      }
    }),
  );

  return router;
}
