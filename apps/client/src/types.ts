import { z } from 'zod';

// Wire shapes returned through the gateway.

export const profileSchema = z.object({
  id: z.string(),
  username: z.string(),
  full_name: z.string().nullable(),
  avatar_url: z.string().nullable(),
});

export const tokensSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
});

export const friendRequestSchema = z.object({
  id: z.string(),
  sender_id: z.string(),
  recipient_id: z.string(),
  status: z.enum(['pending', 'accepted', 'declined', 'cancelled']),
  created_at: z.string(),
  responded_at: z.string().nullable(),
  user: profileSchema.nullable(),
});

export const messageSchema = z.object({
  id: z.string(),
  conversation_id: z.string(),
  sender_id: z.string(),
  client_id: z.string().nullable(),
  body: z.string(),
  seq: z.number(),
  created_at: z.string(),
});

export const conversationSchema = z.object({
  id: z.string(),
  kind: z.enum(['direct', 'group']),
  title: z.string().nullable(),
  role: z.enum(['owner', 'member']),
  members: z.array(profileSchema),
  last_message: messageSchema.nullable(),
  unread: z.number(),
  updated_at: z.string(),
});

export type Profile = z.infer<typeof profileSchema>;
export type Tokens = z.infer<typeof tokensSchema>;
export type FriendRequest = z.infer<typeof friendRequestSchema>;
export type ServerMessage = z.infer<typeof messageSchema>;
export type Conversation = z.infer<typeof conversationSchema>;
export type RelationshipStatus = 'self' | 'friends' | 'outgoing' | 'incoming' | 'none';
