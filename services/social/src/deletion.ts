import { payloadString, type ConsumerHandler } from '@huddle/events';
import { SocialStore } from './store';

// Deleted accounts lose every friendship and their open requests.
export const accountDeletionHandler =
  (store: SocialStore): ConsumerHandler =>
  async (evt) => {
    if (evt.event_type !== 'identity.account_deleted') return;
    const userId = payloadString(evt, 'user_id');
    if (!userId) return;
    await store.purgeUser(userId);
  };
