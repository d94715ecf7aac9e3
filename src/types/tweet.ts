/**
 * Domain model produced by the decoders.
 *
 * Every value here is plain data with no link back to the JSON it came from.
 * Tweets form a tree: a retweet or quote holds another Tweet of any variant.
 */

export interface User {
  id: string;
  handle: string;
  displayName: string;
  description: string;
}

/** `[start, end)` code-point offsets of the displayed part of `text`. */
export type TextRange = readonly [start: number, end: number];

export interface PlainTweet {
  type: "plain";
  author: User;
  text: string;
  textRange: TextRange;
}

export interface QuoteTweet {
  type: "quote";
  author: User;
  text: string;
  textRange: TextRange;
  quoted: Tweet;
}

export interface Retweet {
  type: "retweet";
  author: User; // the retweeting account, not the original author
  retweeted: Tweet;
}

// Deleted, suspended or withheld content. No author, no text.
export interface TombstoneTweet {
  type: "tombstone";
}

export type Tweet = PlainTweet | QuoteTweet | Retweet | TombstoneTweet;

export type TimelineEntryKind = "pinned" | "status";

export interface TimelineEntry {
  kind: TimelineEntryKind;
  tweet: Tweet;
}

export interface TimelinePage {
  entries: TimelineEntry[];
  cursorTop: string;
  cursorBottom: string; // pass as `cursor` to fetch the next page
}
