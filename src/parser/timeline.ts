/**
 * UserTweets timeline decoder.
 *
 * The response carries an ordered list of instructions. `TimelineAddEntries`
 * holds the chronological tweets followed by two cursor entries (top, bottom);
 * `TimelinePinEntry` holds the profile's pinned tweet. Entries are emitted in
 * instruction order, so a pin instruction ahead of the add-entries instruction
 * puts the pinned tweet first.
 */

import type { Tweet, TimelineEntry, TimelinePage } from "../types/tweet";
import { CursorEntrySchema, TimelineResponseSchema, TweetEntrySchema } from "../types/graphql";
import { TimelineDecodeError } from "../errors";
import { child, ROOT_PATH, toDecodeError } from "./path";
import { parseTweet } from "./tweet";

const ADD_ENTRIES = "TimelineAddEntries";
const PIN_ENTRY = "TimelinePinEntry";

const INSTRUCTIONS_PATH = child(ROOT_PATH, "data", "user", "result", "timeline_v2", "timeline", "instructions");

export function extractCursorValue(entry: unknown): string {
  const parsed = CursorEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new TimelineDecodeError("cursor entry has no content.value");
  }
  return parsed.data.content.value;
}

/** Decodes the tweet held by a timeline item (`content.itemContent.tweet_results.result`). */
export function parseTweetEntry(entry: unknown, path: string): Tweet {
  const parsed = TweetEntrySchema.safeParse(entry);
  if (!parsed.success) throw toDecodeError(path, parsed.error);

  return parseTweet(
    parsed.data.content.itemContent.tweet_results.result,
    child(path, "content", "itemContent", "tweet_results", "result")
  );
}

export function decodeTimeline(response: unknown, includePinned: boolean): TimelinePage {
  const parsed = TimelineResponseSchema.safeParse(response);
  if (!parsed.success) {
    const where = child(ROOT_PATH, ...(parsed.error.issues[0]?.path ?? []));
    throw new TimelineDecodeError(`unexpected response envelope at ${where}`);
  }

  const instructions = parsed.data.data.user.result.timeline_v2.timeline.instructions;
  const entries: TimelineEntry[] = [];
  let cursors: { top: unknown; bottom: unknown } | null = null;

  for (const [i, instruction] of instructions.entries()) {
    const instructionPath = child(INSTRUCTIONS_PATH, i);

    if (instruction.type === ADD_ENTRIES) {
      const items = instruction.entries ?? [];
      if (items.length < 2) {
        throw new TimelineDecodeError(`${instructionPath} has ${items.length} entries, expected two trailing cursors`);
      }

      const tweets = items.slice(0, -2);
      for (const [j, item] of tweets.entries()) {
        entries.push({ kind: "status", tweet: parseTweetEntry(item, child(instructionPath, "entries", j)) });
      }

      cursors = { top: items[items.length - 2], bottom: items[items.length - 1] };
    } else if (instruction.type === PIN_ENTRY && includePinned) {
      entries.push({ kind: "pinned", tweet: parseTweetEntry(instruction.entry, child(instructionPath, "entry")) });
    }
  }

  if (!cursors) {
    throw new TimelineDecodeError(`no ${ADD_ENTRIES} instruction`);
  }

  return {
    entries,
    cursorTop: extractCursorValue(cursors.top),
    cursorBottom: extractCursorValue(cursors.bottom),
  };
}
