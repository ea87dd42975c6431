import { getPool } from '@huddle/shared';
import { runConsumer, TOPICS } from '@huddle/events';
import { logger } from '@huddle/observability';
import { accountDeletionHandler } from './deletion';
import { createPgSocialStore } from './pg-store';

const store = createPgSocialStore(getPool('social'));

async function main() {
  await runConsumer({
    groupId: 'social-account-deletion-worker',
    topics: [TOPICS.identity],
    handler: accountDeletionHandler(store),
  });
  logger.info('social account deletion worker running');
}

main().catch((err) => {
  logger.error('social account deletion worker failed', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
