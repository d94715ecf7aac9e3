#!/usr/bin/env tsx
/**
 * Print a user's timeline, newest first, using an anonymous guest session.
 *
 * Usage: tsx src/cli/print-timeline.ts <handle> [count]
 */

import { Session } from "../session/session";
import { paginateTimeline } from "../session/paginate";
import { formatEntry } from "./format";

async function main() {
  const [handle, countArg] = process.argv.slice(2);
  if (!handle) {
    console.log("Usage: tsx src/cli/print-timeline.ts <handle> [count]");
    process.exit(1);
  }

  const count = countArg ? Number.parseInt(countArg, 10) : 100;
  const session = new Session();
  await session.open();

  const user = await session.getUserByHandle(handle.replace(/^@/, ""));
  console.log(`🐦 ${user.displayName} (@${user.handle}) — ${user.id}\n`);

  let total = 0;
  for await (const page of paginateTimeline(session, user.id, { count })) {
    for (const entry of page.entries) {
      console.log(formatEntry(entry));
    }
    total += page.entries.length;
  }

  console.log(`\nTotal entries: ${total}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
