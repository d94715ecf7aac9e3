/**
 * Tweet tree decoder.
 *
 * A tweet result node is either a tombstone, a plain tweet, a retweet
 * (`legacy.retweeted_status_result`) or a quote (`quoted_status_result`).
 * Retweets and quotes carry exactly one child, so the tree is really a chain:
 * we walk down it with a loop and fold the wrappers back up afterwards,
 * which keeps arbitrarily deep quote-of-retweet-of-quote chains off the call stack.
 */

import type { TextRange, Tweet, User } from "../types/tweet";
import { NestedResultSchema, TweetResultSchema, TypenameSchema } from "../types/graphql";
import { child, ROOT_PATH, toDecodeError } from "./path";
import { parseUser } from "./user";

const TOMBSTONE_TYPENAME = "TweetTombstone";

type Wrapper =
  | { type: "retweet"; author: User }
  | { type: "quote"; author: User; text: string; textRange: TextRange };

type Step =
  | { done: true; tweet: Tweet }
  | { done: false; wrapper: Wrapper; next: unknown; nextPath: string };

export function parseTweet(node: unknown, path = ROOT_PATH): Tweet {
  const wrappers: Wrapper[] = [];
  let current = node;
  let currentPath = path;

  let step = readNode(current, currentPath);
  while (!step.done) {
    wrappers.push(step.wrapper);
    current = step.next;
    currentPath = step.nextPath;
    step = readNode(current, currentPath);
  }

  let tweet = step.tweet;
  for (let i = wrappers.length - 1; i >= 0; i--) {
    const wrapper = wrappers[i];
    tweet =
      wrapper.type === "retweet"
        ? { type: "retweet", author: wrapper.author, retweeted: tweet }
        : { ...wrapper, quoted: tweet };
  }
  return tweet;
}

function readNode(node: unknown, path: string): Step {
  const typename = TypenameSchema.safeParse(node);
  if (!typename.success) throw toDecodeError(path, typename.error);

  // Tombstones have no legacy block; never look for one.
  if (typename.data.__typename === TOMBSTONE_TYPENAME) {
    return { done: true, tweet: { type: "tombstone" } };
  }

  const parsed = TweetResultSchema.safeParse(node);
  if (!parsed.success) throw toDecodeError(path, parsed.error);

  const { core, legacy, quoted_status_result } = parsed.data;
  const author = parseUser(core.user_results.result, child(path, "core", "user_results", "result"));

  if (legacy.retweeted_status_result !== undefined) {
    const nestedPath = child(path, "legacy", "retweeted_status_result");
    return {
      done: false,
      wrapper: { type: "retweet", author },
      next: unwrapResult(legacy.retweeted_status_result, nestedPath),
      nextPath: child(nestedPath, "result"),
    };
  }

  const text = legacy.full_text;
  const textRange: TextRange = [legacy.display_text_range[0], legacy.display_text_range[1]];

  if (quoted_status_result !== undefined) {
    const nestedPath = child(path, "quoted_status_result");
    return {
      done: false,
      wrapper: { type: "quote", author, text, textRange },
      next: unwrapResult(quoted_status_result, nestedPath),
      nextPath: child(nestedPath, "result"),
    };
  }

  return { done: true, tweet: { type: "plain", author, text, textRange } };
}

function unwrapResult(wrapper: unknown, path: string): unknown {
  const parsed = NestedResultSchema.safeParse(wrapper);
  if (!parsed.success) throw toDecodeError(path, parsed.error);
  return parsed.data.result;
}
