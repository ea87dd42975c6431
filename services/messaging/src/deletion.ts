import { payloadString, type ConsumerHandler } from '@huddle/events';
import { MessagingStore } from './store';

export const accountDeletionHandler =
  (store: MessagingStore): ConsumerHandler =>
  async (evt) => {
    if (evt.event_type !== 'identity.account_deleted') return;
    const userId = payloadString(evt, 'user_id');
    if (!userId) return;
    await store.purgeUser(userId);
  };
