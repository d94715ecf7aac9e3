import type { User } from "../types/tweet";
import { UserResultSchema } from "../types/graphql";
import { ROOT_PATH, toDecodeError } from "./path";

/**
 * Decode a `user_results.result` node.
 * Throws TweetDecodeError when any of the four fields is absent.
 */
export function parseUser(node: unknown, path = ROOT_PATH): User {
  const parsed = UserResultSchema.safeParse(node);
  if (!parsed.success) throw toDecodeError(path, parsed.error);

  const { rest_id, legacy } = parsed.data;
  return {
    id: rest_id,
    handle: legacy.screen_name,
    displayName: legacy.name,
    description: legacy.description,
  };
}
