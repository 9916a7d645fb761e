/**
 * src/modules/auth/helpers/enqueue-email.ts
 *
 * WHY:
 * - Email is a side effect after state is committed. If the queue refuses a
 *   message, the flow still succeeds; we log and move on.
 */

import type { QueueMessage } from '../../../shared/messaging/queue';
import type { AuthFlowDeps } from '../flows/auth-flow.deps';

export async function enqueueEmail(
  deps: Pick<AuthFlowDeps, 'queue' | 'logger'>,
  message: QueueMessage,
  log: { requestId?: string; emailKey: string },
): Promise<void> {
  try {
    await deps.queue.enqueue(message);
  } catch (err) {
    deps.logger.error({
      msg: 'auth.email.enqueue_failed',
      flow: 'auth.email',
      type: message.type,
      requestId: log.requestId,
      emailKey: log.emailKey,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
