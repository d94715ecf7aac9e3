export { parseTweet } from "./tweet";
export { parseUser } from "./user";
export { decodeTimeline, extractCursorValue, parseTweetEntry } from "./timeline";
