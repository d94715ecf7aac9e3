/**
 * Request builders for the two GraphQL reads and the client-event report.
 * Pure: they only shape paths and parameters, the session sends them.
 */

import { USER_BY_SCREEN_NAME_FEATURES, USER_TWEETS_FEATURES } from "./features";

export interface GraphqlOperation {
  queryId: string;
  name: "UserByScreenName" | "UserTweets";
}

export const USER_BY_SCREEN_NAME: GraphqlOperation = { queryId: "pVrmNaXcxPjisIvKtLDMEA", name: "UserByScreenName" };
export const USER_TWEETS: GraphqlOperation = { queryId: "WzJjibAcDa-oCjCcLOotcg", name: "UserTweets" };

export const DEFAULT_TIMELINE_COUNT = 40;

export interface GraphqlRequest {
  path: string; // relative to the GraphQL base URL
  queryParams: {
    variables: string;
    features: string;
  };
}

export interface ClientEventRequest {
  path: string; // relative to the REST API base URL
  form: {
    category: string;
    log: string;
  };
}

function toRequest(
  operation: GraphqlOperation,
  variables: Record<string, unknown>,
  features: Record<string, boolean>
): GraphqlRequest {
  return {
    path: `${operation.queryId}/${operation.name}`,
    queryParams: {
      variables: JSON.stringify(variables),
      features: JSON.stringify(features),
    },
  };
}

export function buildUserByHandle(handle: string): GraphqlRequest {
  return toRequest(USER_BY_SCREEN_NAME, { screen_name: handle }, USER_BY_SCREEN_NAME_FEATURES);
}

export function buildTimeline(userId: string, count?: number, cursor?: string): GraphqlRequest {
  const variables: Record<string, unknown> = {
    userId,
    count: count ?? DEFAULT_TIMELINE_COUNT,
    includePromotedContent: true,
    withQuickPromoteEligibilityTweetFields: true,
    withVoice: true,
    withV2Timeline: true,
  };

  // No cursor means "head of the timeline"; the key must be absent, not empty.
  if (cursor !== undefined) {
    variables.cursor = cursor;
  }

  return toRequest(USER_TWEETS, variables, USER_TWEETS_FEATURES);
}

/**
 * The web client reports how long after the cookie fetch its bundle loaded.
 * `now` and `cookieFetchTime` are epoch milliseconds.
 */
export function buildClientEvent(cookieFetchTime: number, now: number): ClientEventRequest {
  return {
    path: "jot/client_event.json",
    form: {
      category: "perftown",
      log: JSON.stringify([
        {
          description: "rweb:cookiesMetadata:load",
          product: "rweb",
          event_value: now - cookieFetchTime,
        },
      ]),
    },
  };
}
