import { InProcessEventBus } from '@quill/shared';
import { logger } from '../shared/logger';

/** The API's one event bus; handler failures are logged, never raised to the publisher. */
export const eventBus = new InProcessEventBus({
  onHandlerError: (err, event) => {
    logger.error(
      { err, eventType: event.type, contractId: event.contractId, correlationId: event.correlationId },
      'Event handler failed',
    );
  },
});
