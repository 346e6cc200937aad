/**
 * Who may open a delivery socket for which conversation.
 *
 * Authentication and membership belong to other services; the gateway only
 * asks. The Supabase implementation verifies the access token and looks the
 * user up in the membership table.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { incrementCounter, recordTimer } from './metrics';
import type { ConversationId, UserId } from './types';

export interface SessionAuthorizer {
  /** Null when the token is missing, expired or invalid. */
  authenticate(token: string): Promise<{ userId: UserId } | null>;
  isMember(conversationId: ConversationId, userId: UserId): Promise<boolean>;
}

export type SupabaseAuthorizerOptions = {
  url: string;
  anonKey: string;
  serviceRoleKey: string;
  membershipTable?: string;
};

export function createSupabaseAuthorizer({
  url,
  anonKey,
  serviceRoleKey,
  membershipTable = 'conversation_members',
}: SupabaseAuthorizerOptions): SessionAuthorizer {
  const clientOptions = { auth: { persistSession: false, autoRefreshToken: false } };
  const anonClient: SupabaseClient = createClient(url, anonKey, clientOptions);
  const serviceClient: SupabaseClient = createClient(url, serviceRoleKey, clientOptions);

  return {
    async authenticate(token) {
      const startTime = Date.now();
      try {
        const {
          data: { user },
          error,
        } = await anonClient.auth.getUser(token);
        recordTimer('delivery.auth.latency', Date.now() - startTime);

        if (error || !user) {
          incrementCounter('delivery.auth.failed');
          return null;
        }
        incrementCounter('delivery.auth.success');
        return { userId: user.id };
      } catch {
        recordTimer('delivery.auth.latency', Date.now() - startTime);
        incrementCounter('delivery.auth.failed', { error: 'exception' });
        return null;
      }
    },

    async isMember(conversationId, userId) {
      const { data, error } = await serviceClient
        .from(membershipTable)
        .select('conversation_id')
        .eq('conversation_id', conversationId)
        .eq('user_id', userId)
        .maybeSingle();

      if (error) {
        throw new Error(`Membership lookup failed: ${error.message}`);
      }
      return data !== null;
    },
  };
}
