/**
 * One-line renderings of timeline entries for the CLI.
 */

import type { TimelineEntry, Tweet } from "../types/tweet";

const QUOTE_PREVIEW_CHARS = 40;

function displayed(text: string, range: readonly [number, number]): string {
  // display_text_range counts code points, not UTF-16 units
  return Array.from(text).slice(range[0], range[1]).join("");
}

function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > QUOTE_PREVIEW_CHARS ? `${chars.slice(0, QUOTE_PREVIEW_CHARS).join("")}...` : text;
}

export function formatTweet(tweet: Tweet): string {
  switch (tweet.type) {
    case "tombstone":
      return "[unavailable]";
    case "plain":
      return `@${tweet.author.handle}: ${displayed(tweet.text, tweet.textRange)}`;
    case "retweet":
      return `@${tweet.author.handle} RT ${formatTweet(tweet.retweeted)}`;
    case "quote":
      return `@${tweet.author.handle}: ${displayed(tweet.text, tweet.textRange)} QT "${preview(formatTweet(tweet.quoted))}"`;
  }
}

export function formatEntry(entry: TimelineEntry): string {
  const line = formatTweet(entry.tweet);
  return entry.kind === "pinned" ? `[pinned] ${line}` : line;
}
