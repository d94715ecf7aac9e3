/**
 * Synthetic GraphQL nodes for tests. Shapes follow what the decoders read;
 * everything else the live API sends is left out.
 */

import type { Tweet, User } from "../types/tweet";

export const ALICE: User = { id: "42", handle: "alice", displayName: "Alice", description: "hello from alice" };
export const BOB: User = { id: "7", handle: "bob", displayName: "Bob B.", description: "" };

export function userNode(user: User) {
  return {
    __typename: "User",
    rest_id: user.id,
    legacy: {
      screen_name: user.handle,
      name: user.displayName,
      description: user.description,
      followers_count: 10,
    },
  };
}

export function tombstoneNode() {
  return {
    __typename: "TweetTombstone",
    tombstone: { text: { text: "This Tweet was deleted by the Tweet author." } },
  };
}

export function plainNode(author: User, text: string) {
  return {
    __typename: "Tweet",
    core: { user_results: { result: userNode(author) } },
    legacy: {
      full_text: text,
      display_text_range: [0, Array.from(text).length],
      favorite_count: 3,
    },
  };
}

export function quoteNode(author: User, text: string, quoted: unknown) {
  return { ...plainNode(author, text), quoted_status_result: { result: quoted } };
}

export function retweetNode(author: User, retweeted: unknown) {
  const node = plainNode(author, "RT");
  return { ...node, legacy: { ...node.legacy, retweeted_status_result: { result: retweeted } } };
}

/** Inverse of parseTweet, for round-trip checks. */
export function encodeTweet(tweet: Tweet): unknown {
  switch (tweet.type) {
    case "tombstone":
      return tombstoneNode();
    case "retweet":
      return retweetNode(tweet.author, encodeTweet(tweet.retweeted));
    case "plain":
    case "quote": {
      const base = {
        __typename: "Tweet",
        core: { user_results: { result: userNode(tweet.author) } },
        legacy: { full_text: tweet.text, display_text_range: [tweet.textRange[0], tweet.textRange[1]] },
      };
      return tweet.type === "quote" ? { ...base, quoted_status_result: { result: encodeTweet(tweet.quoted) } } : base;
    }
  }
}

export function tweetEntry(result: unknown, id = "1") {
  return {
    entryId: `tweet-${id}`,
    sortIndex: id,
    content: {
      entryType: "TimelineTimelineItem",
      itemContent: { itemType: "TimelineTweet", tweet_results: { result } },
    },
  };
}

export function cursorEntry(position: "top" | "bottom", value: string) {
  return {
    entryId: `cursor-${position}-${value}`,
    sortIndex: "0",
    content: { entryType: "TimelineTimelineCursor", value, cursorType: position === "top" ? "Top" : "Bottom" },
  };
}

export function timelineResponse(instructions: unknown[]) {
  return {
    data: {
      user: {
        result: {
          __typename: "User",
          timeline_v2: { timeline: { instructions } },
        },
      },
    },
  };
}

export function addEntries(entries: unknown[]) {
  return { type: "TimelineAddEntries", entries };
}

export function pinEntry(entry: unknown) {
  return { type: "TimelinePinEntry", entry };
}

export const BEARER_TOKEN = `AAAA${"x".repeat(96)}%3D1`;

export function webappHtml(options: { scriptSrc?: string; guestCookie?: string; metadata?: string } = {}) {
  const {
    scriptSrc = "https://abs.twimg.com/responsive-web/client-web/main.abc123.js",
    guestCookie = "gt=1700000000000000001; Max-Age=10800; Domain=.twitter.com; Path=/; Secure",
    metadata,
  } = options;

  return [
    "<!DOCTYPE html><html><head>",
    '<script src="https://abs.twimg.com/responsive-web/client-web/vendor.aaa.js" nonce="n1"></script>',
    metadata === undefined ? "" : `<script nonce="n1">window.__META_DATA__=${metadata};</script>`,
    guestCookie === "" ? "" : `<script nonce="n1">document.cookie="${guestCookie}";</script>`,
    scriptSrc === "" ? "" : `<script type="text/javascript" charset="utf-8" nonce="n1" crossorigin="anonymous" src="${scriptSrc}"></script>`,
    "</head><body></body></html>",
  ].join("\n");
}

export function mainScript(token = BEARER_TOKEN) {
  return `(()=>{var e={};e.a="ACTION_FLUSH",e.b="${token}",e.c="https://api.twitter.com"})();`;
}
