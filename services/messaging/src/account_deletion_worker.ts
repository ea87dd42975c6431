import { getPool } from '@huddle/shared';
import { runConsumer, TOPICS } from '@huddle/events';
import { logger } from '@huddle/observability';
import { accountDeletionHandler } from './deletion';
import { createPgMessagingStore } from './pg-store';

// Deleted accounts leave every group (ownership handed on) and lose their direct conversations.
const store = createPgMessagingStore(getPool('messaging'));

async function main() {
  await runConsumer({
    groupId: 'messaging-account-deletion-worker',
    topics: [TOPICS.identity],
    handler: accountDeletionHandler(store),
  });
  logger.info('messaging account deletion worker running');
}

main().catch((err) => {
  logger.error('messaging account deletion worker failed', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
